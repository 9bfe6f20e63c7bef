/**
 * Text and time formatting for the list and header rows
 */

/**
 * Cut `text` to `len` characters, marking the cut with an ellipsis
 */
export function truncate(text: string, len: number): string {
	const chars = Array.from(text);
	if (chars.length <= len) {
		return text;
	}
	return `${chars.slice(0, Math.max(0, len)).join("")}…`;
}

/**
 * Format milliseconds as HH:MM:SS
 */
export function displayTime(ms: number): string {
	const totalSeconds = Math.max(0, Math.floor(ms / 1000));
	const sec = totalSeconds % 60;
	const min = Math.floor(totalSeconds / 60) % 60;
	const hrs = Math.floor(totalSeconds / 3600);
	return [hrs, min, sec].map((n) => String(n).padStart(2, "0")).join(":");
}

const NAMED_ENTITIES: Record<string, string> = {
	amp: "&",
	lt: "<",
	gt: ">",
	quot: '"',
	apos: "'",
};

/**
 * The search API returns snippet titles HTML-escaped ("Rock &amp; Roll")
 */
export function decodeHtmlEntities(text: string): string {
	return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
		if (body.startsWith("#x") || body.startsWith("#X")) {
			return String.fromCodePoint(parseInt(body.slice(2), 16));
		}
		if (body.startsWith("#")) {
			return String.fromCodePoint(parseInt(body.slice(1), 10));
		}
		return NAMED_ENTITIES[body.toLowerCase()] ?? match;
	});
}
