import * as cheerio from "cheerio";
import { isTag, type AnyNode, type Element } from "domhandler";
import { normalizeWhitespace } from "../utils/shared";

/** Page regions that are never treated as chrome, nor is anything inside them */
const CONTENT_ROOTS = "main, article, [role='main']";

/** Tags whose contents are never page text */
const NON_TEXT_SELECTOR = [
    "script", "style", "link", "meta", "noscript", "template",
    "img", "picture", "svg", "canvas", "iframe", "video", "audio", "object", "embed",
    "form", "input", "select", "textarea", "button", "label", "dialog",
].join(", ");

// <header> is not listed: event pages put dates and venue in the hero
const CHROME_SELECTOR = "nav, footer, aside";

/** id/class hints for chrome built from plain divs */
const CHROME_HINT = new RegExp(
    [
        "(^|[\\s_-])nav(bar|igation)?([\\s_-]|$)",
        "footer", "sidebar", "breadcrumb",
        "cookie", "consent", "gdpr",
        "advert", "social", "share", "popup", "modal",
        "newsletter", "subscribe",
        "skip[-_]?(link|to)", "search[-_]?(form|box|bar)",
    ].join("|"),
    "i"
);

/** Labels of controls that survive as links or spans */
const CONTROL_LABEL = /^((share|tweet|copy)\s*(this|link|page)?|(scroll\s*to\s*)?top|back\s+to\s+top|skip\s+to\s+(main\s+)?content|(accept|reject)\s*(all\s*)?cookies?)$/i;
const CONTROL_LABEL_MAX = 50;

function hintsOf(el: Element): string {
    return `${el.attribs.id ?? ""} ${el.attribs.class ?? ""}`;
}

/**
 * Load HTML and drop elements that never hold readable text
 */
export function stripHtml(html: string): cheerio.CheerioAPI {
    const $ = cheerio.load(html);
    $(NON_TEXT_SELECTOR).remove();
    return $;
}

/**
 * Remove navigation, footers, cookie banners and similar chrome.
 * Elements that are, sit inside, or contain a content root are kept.
 */
export function removeBoilerplate($: cheerio.CheerioAPI): void {
    const touchesContent = (el: AnyNode): boolean => {
        const $el = $(el);
        return $el.closest(CONTENT_ROOTS).length > 0 || $el.find(CONTENT_ROOTS).length > 0;
    };

    $(CHROME_SELECTOR).each((_, el) => {
        if (!touchesContent(el)) $(el).remove();
    });

    $("body *").each((_, el) => {
        if (isTag(el) && CHROME_HINT.test(hintsOf(el)) && !touchesContent(el)) {
            $(el).remove();
        }
    });

    $("a, span, div, p").each((_, el) => {
        const label = normalizeWhitespace($(el).text());
        if (label.length < CONTROL_LABEL_MAX && CONTROL_LABEL.test(label)) {
            $(el).remove();
        }
    });
}

/**
 * Strip non-text elements and chrome, then hand back <body> as the
 * container. cheerio.load always builds a full document, so a body exists
 * even for fragments. The title is read before anything is removed.
 */
export function preprocessHtml(html: string): {
    $: cheerio.CheerioAPI;
    container: cheerio.Cheerio<AnyNode>;
    title: string;
} {
    const $ = stripHtml(html);
    const title = normalizeWhitespace($("title").first().text());
    removeBoilerplate($);

    return { $, container: $("body"), title };
}
