/**
 * Paging over the playlist and the search results.
 * Page counts are always derived from the current list length.
 */

export function getTotalPages(length: number, pageSize: number): number {
	if (pageSize <= 0) return 0;
	return Math.ceil(length / pageSize);
}

/**
 * Items on `page`, or an empty array when the page starts past the end
 */
export function paginate<T>(list: readonly T[], page: number, pageSize: number): T[] {
	const start = page * pageSize;
	if (pageSize <= 0 || start < 0 || start >= list.length) {
		return [];
	}
	return list.slice(start, start + pageSize);
}

/**
 * Highest valid page index for the list (0 for an empty list)
 */
export function lastPage(length: number, pageSize: number): number {
	return Math.max(0, getTotalPages(length, pageSize) - 1);
}

/**
 * Number of items shown on `page`
 */
export function itemsOnPage(length: number, page: number, pageSize: number): number {
	const start = page * pageSize;
	if (pageSize <= 0 || start >= length) return 0;
	return Math.min(pageSize, length - start);
}

/**
 * Absolute list index of the in-page selection
 */
export function absoluteIndex(page: number, pageSize: number, selected: number): number {
	return page * pageSize + selected;
}

/**
 * Rows available to a list on a terminal `rows` tall
 */
export function pageSizeFor(rows: number, reserved: number): number {
	return Math.max(1, rows - reserved);
}
