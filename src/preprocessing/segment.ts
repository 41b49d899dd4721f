import type * as cheerio from "cheerio";
import { isTag, isText, type AnyNode } from "domhandler";
import type { Block, BlockType } from "../types";
import { isHeadingTag, getHeadingLevel, normalizeWhitespace } from "../utils/shared";

const BLOCK_SELECTOR = "p, li, pre, tr, h1, h2, h3, h4, h5, h6";

const BLOCK_TYPES: ReadonlySet<string> = new Set<BlockType>([
    "h1", "h2", "h3", "h4", "h5", "h6", "p", "li", "pre", "tr",
]);

function isBlockType(tagName: string): tagName is BlockType {
    return BLOCK_TYPES.has(tagName);
}

function tagNameOf($el: cheerio.Cheerio<AnyNode>): string {
    const name = $el.prop("tagName");
    return typeof name === "string" ? name.toLowerCase() : "";
}

/**
 * Collects blocks in document order, tracking the chain of headings
 * each block sits under.
 */
class BlockCollector {
    readonly blocks: Block[] = [];
    private readonly headings: string[] = [];

    constructor(private readonly $: cheerio.CheerioAPI) {}

    visit($el: cheerio.Cheerio<AnyNode>): void {
        const type = tagNameOf($el);

        if (isBlockType(type)) {
            this.add(type, this.blockText(type, $el));
            // Nested lists are blocks of their own
            if (type === "li") {
                $el.children("ul, ol").each((_, list) => this.visit(this.$(list)));
            }
            return;
        }

        // Layout elements with bare text (hero banners, date badges) become paragraphs
        if ($el.find(BLOCK_SELECTOR).length === 0) {
            this.add("p", this.inlineText($el));
            return;
        }

        $el.children().each((_, child) => {
            if (isTag(child)) this.visit(this.$(child));
        });
    }

    private add(type: BlockType, text: string): void {
        if (text.length === 0) return;

        const level = getHeadingLevel(type);
        if (level !== null && this.headings.length >= level) {
            // A heading keeps only its ancestors, not earlier siblings
            this.headings.length = level - 1;
        }

        this.blocks.push({
            type,
            text,
            index: this.blocks.length,
            headingPath: [...this.headings],
        });

        if (isHeadingTag(type)) this.headings.push(text);
    }

    private blockText(type: BlockType, $el: cheerio.Cheerio<AnyNode>): string {
        switch (type) {
            case "pre":
                return this.codeText($el);
            case "tr":
                return this.rowText($el);
            case "li": {
                const $item = $el.clone();
                $item.find("ul, ol").remove();
                return normalizeWhitespace($item.text());
            }
            default:
                return normalizeWhitespace($el.text());
        }
    }

    /** Keeps line breaks from .line wrappers, <br> or plain newlines */
    private codeText($pre: cheerio.Cheerio<AnyNode>): string {
        const $lines = $pre.find(".line, .code-line");
        if ($lines.length > 0) {
            return $lines
                .toArray()
                .map(line => this.$(line).text().trimEnd())
                .join("\n")
                .trim();
        }

        const html = $pre.html() ?? "";
        if (/<br\s*\/?>/i.test(html)) {
            const lined = html.replace(/<br\s*\/?>/gi, "\n");
            return this.$.load(`<div>${lined}</div>`)("div").text().trim();
        }

        return $pre.text().trim();
    }

    /** Cells joined by " | "; a row of empty cells is dropped */
    private rowText($tr: cheerio.Cheerio<AnyNode>): string {
        const cells = $tr
            .children("td, th")
            .toArray()
            .map(cell => normalizeWhitespace(this.$(cell).text()));
        return cells.some(c => c.length > 0) ? cells.join(" | ") : "";
    }

    /** Text with a space between sibling inline elements */
    private inlineText($el: cheerio.Cheerio<AnyNode>): string {
        const parts: string[] = [];
        $el.contents().each((_, child) => {
            if (isText(child)) {
                parts.push(child.data);
            } else if (isTag(child)) {
                parts.push(this.inlineText(this.$(child)));
            }
        });
        return normalizeWhitespace(parts.join(" "));
    }
}

/**
 * Blocks of a container in document order. Bare text sitting beside block
 * elements in the same parent is not kept.
 */
export function extractBlocks(
    $: cheerio.CheerioAPI,
    container: cheerio.Cheerio<AnyNode>,
): Block[] {
    const collector = new BlockCollector($);
    collector.visit(container);
    return collector.blocks;
}
