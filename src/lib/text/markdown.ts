/**
 * HTML <-> Markdown for post bodies
 *
 * Covers the subset fediverse servers emit (paragraphs, line breaks,
 * links, emphasis, code, quotes, lists). Anything else is reduced to text.
 */

export const decodeEntities = (value: string) =>
    value
        .replace(/&#x([0-9a-fA-F]+);/g, (_, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
        .replace(/&#(\d+);/g, (_, num: string) => String.fromCodePoint(Number(num)))
        .replace(/&nbsp;/g, ' ')
        .replace(/&quot;/g, '"')
        .replace(/&apos;/g, "'")
        .replace(/&lt;/g, '<')
        .replace(/&gt;/g, '>')
        .replace(/&amp;/g, '&');

const escapeHtml = (value: string) =>
    value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');

const stripTags = (value: string) => value.replace(/<[^>]*>/g, '');

const attr = (tag: string, name: string): string | null => {
    const match = tag.match(new RegExp(`\\s${name}\\s*=\\s*(?:"([^"]*)"|'([^']*)')`, 'i'));
    if (!match) return null;
    return decodeEntities(match[1] ?? match[2] ?? '');
};

/**
 * Convert post HTML to Markdown
 */
export function htmlToMarkdown(html: string): string {
    let text = html.replace(/\r\n?/g, '\n');

    // Link labels may be split into hidden spans; rebuild them from href
    text = text.replace(/<a\b([^>]*)>([\s\S]*?)<\/a>/gi, (_, attrs: string, inner: string) => {
        const href = attr(` ${attrs}`, 'href');
        const label = decodeEntities(stripTags(inner)).trim();
        if (!href) return label;
        const bare = href.replace(/^https?:\/\//, '').replace(/\/$/, '');
        const bareLabel = label.replace(/^https?:\/\//, '').replace(/\/$/, '').replace(/…$/, '');
        if (!label || label === href || bare === bareLabel || (bare.startsWith(bareLabel) && label.endsWith('…'))) {
            return href;
        }
        return `[${label}](${href})`;
    });

    text = text
        .replace(/<pre\b[^>]*>(?:\s*<code\b[^>]*>)?([\s\S]*?)(?:<\/code>\s*)?<\/pre>/gi, (_, code: string) => `\n\`\`\`\n${stripTags(code)}\n\`\`\`\n`)
        .replace(/<code\b[^>]*>([\s\S]*?)<\/code>/gi, (_, code: string) => `\`${stripTags(code)}\``)
        .replace(/<(strong|b)\b[^>]*>([\s\S]*?)<\/\1>/gi, (_, _tag: string, inner: string) => `**${inner}**`)
        .replace(/<(em|i)\b[^>]*>([\s\S]*?)<\/\1>/gi, (_, _tag: string, inner: string) => `*${inner}*`)
        .replace(/<(del|s)\b[^>]*>([\s\S]*?)<\/\1>/gi, (_, _tag: string, inner: string) => `~~${inner}~~`)
        .replace(/<blockquote\b[^>]*>([\s\S]*?)<\/blockquote>/gi, (_, inner: string) => {
            const quoted = htmlToMarkdown(inner).split('\n').map((line) => `> ${line}`).join('\n');
            return `\n${quoted}\n\n`;
        })
        .replace(/<li\b[^>]*>([\s\S]*?)<\/li>/gi, (_, inner: string) => `- ${stripTags(inner).trim()}\n`)
        .replace(/<br\s*\/?>/gi, '\n')
        .replace(/<\/p>\s*<p\b[^>]*>/gi, '\n\n')
        .replace(/<\/?(p|div|ul|ol|span|h[1-6])\b[^>]*>/gi, (match) => (/^<\/(p|div|ul|ol|h[1-6])/i.test(match) ? '\n' : ''));

    text = decodeEntities(stripTags(text));

    return text
        .split('\n')
        .map((line) => line.replace(/[ \t]+$/, ''))
        .join('\n')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}

const URL_REGEX = /https?:\/\/[^\s<>"]+[^\s<>".,;:!?)\]]/g;

function inline(text: string): string {
    const codeSpans: string[] = [];
    let html = escapeHtml(text).replace(/`([^`\n]+)`/g, (_, code: string) => {
        codeSpans.push(`<code>${code}</code>`);
        return `\u0000${codeSpans.length - 1}\u0000`;
    });

    const links: string[] = [];
    const stash = (value: string) => {
        links.push(value);
        return `\u0001${links.length - 1}\u0001`;
    };

    html = html
        .replace(/\[([^\]\n]+)\]\((https?:\/\/[^\s)]+)\)/g, (_, label: string, href: string) =>
            stash(`<a href="${href}" rel="nofollow noopener" target="_blank">${label}</a>`))
        .replace(URL_REGEX, (url) => stash(`<a href="${url}" rel="nofollow noopener" target="_blank">${url}</a>`))
        .replace(/\*\*([^*\n]+)\*\*/g, '<strong>$1</strong>')
        .replace(/(^|[^*\w])\*([^*\n]+)\*(?!\w)/g, '$1<em>$2</em>')
        .replace(/~~([^~\n]+)~~/g, '<del>$1</del>');

    return html
        .replace(/\u0001(\d+)\u0001/g, (_, i: string) => links[Number(i)])
        .replace(/\u0000(\d+)\u0000/g, (_, i: string) => codeSpans[Number(i)]);
}

/**
 * Convert Markdown (as written in Nostr notes) to post HTML
 */
export function markdownToHtml(markdown: string): string {
    const blocks = markdown.replace(/\r\n?/g, '\n').trim().split(/\n{2,}/);
    const html: string[] = [];

    for (const block of blocks) {
        if (!block.trim()) continue;

        const fence = block.match(/^```[^\n]*\n([\s\S]*?)\n?```$/);
        if (fence) {
            html.push(`<pre><code>${escapeHtml(fence[1])}</code></pre>`);
            continue;
        }

        const lines = block.split('\n');
        if (lines.every((line) => line.startsWith('>'))) {
            const quoted = lines.map((line) => line.replace(/^>\s?/, '')).join('\n');
            html.push(`<blockquote>${markdownToHtml(quoted)}</blockquote>`);
            continue;
        }

        html.push(`<p>${lines.map(inline).join('<br>')}</p>`);
    }

    return html.join('');
}
