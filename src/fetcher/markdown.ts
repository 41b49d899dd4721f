import type { Block } from "../types";
import { getHeadingLevel } from "../utils/shared";
import { preprocessHtml } from "../preprocessing/strip";
import { extractBlocks } from "../preprocessing/segment";

/**
 * Render blocks as markdown. Blocks are separated by a blank line, except
 * that consecutive list items and consecutive table rows stay together so
 * a list or table is one paragraph for the chunker.
 */
export function renderBlocks(blocks: Block[]): string {
    const parts: string[] = [];
    let previous: Block["type"] | null = null;

    for (const block of blocks) {
        const level = getHeadingLevel(block.type);
        let line: string;

        if (level !== null) {
            line = `${"#".repeat(level)} ${block.text}`;
        } else if (block.type === "pre") {
            line = "```\n" + block.text + "\n```";
        } else if (block.type === "li") {
            line = `- ${block.text}`;
        } else if (block.type === "tr") {
            line = `| ${block.text} |`;
        } else {
            line = block.text;
        }

        const grouped = previous === block.type && (block.type === "li" || block.type === "tr");
        if (parts.length > 0) {
            parts.push(grouped ? "\n" : "\n\n");
        }
        parts.push(line);
        previous = block.type;
    }

    return parts.join("");
}

/**
 * Convert an HTML document to markdown, with the page <title> as a
 * level-one heading when the body does not start with one.
 */
export function htmlToMarkdown(html: string): string {
    const { $, container, title } = preprocessHtml(html);
    const blocks = extractBlocks($, container);

    const first = blocks[0];
    if (title.length > 0 && (first === undefined || first.type !== "h1")) {
        blocks.unshift({ type: "h1", text: title, index: -1, headingPath: [] });
    }

    return renderBlocks(blocks);
}
