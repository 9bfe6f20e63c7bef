import { describe, expect, it } from "vitest";
import {
	absoluteIndex,
	getTotalPages,
	itemsOnPage,
	lastPage,
	pageSizeFor,
	paginate,
} from "./pagination";

describe("getTotalPages", () => {
	it("uses ceiling division", () => {
		expect(getTotalPages(0, 10)).toBe(0);
		expect(getTotalPages(10, 10)).toBe(1);
		expect(getTotalPages(11, 10)).toBe(2);
		expect(getTotalPages(1, 10)).toBe(1);
	});

	it("never decreases as the list grows", () => {
		let previous = 0;
		for (let len = 0; len < 100; len++) {
			const pages = getTotalPages(len, 7);
			expect(pages).toBeGreaterThanOrEqual(previous);
			previous = pages;
		}
	});
});

describe("paginate", () => {
	it("reconstructs the list from its pages", () => {
		const list = Array.from({ length: 23 }, (_, i) => `item-${i}`);
		const size = 5;
		const pages = Array.from({ length: getTotalPages(list.length, size) }, (_, p) =>
			paginate(list, p, size),
		);
		expect(pages.flat()).toEqual(list);
		expect(pages.every((page) => page.length > 0)).toBe(true);
		expect(pages[pages.length - 1]).toHaveLength(3);
	});

	it("returns an empty page past the end", () => {
		expect(paginate([1, 2, 3], 1, 3)).toEqual([]);
		expect(paginate([], 0, 3)).toEqual([]);
	});
});

describe("page helpers", () => {
	it("computes the last page and items per page", () => {
		expect(lastPage(0, 4)).toBe(0);
		expect(lastPage(9, 4)).toBe(2);
		expect(itemsOnPage(9, 2, 4)).toBe(1);
		expect(itemsOnPage(9, 3, 4)).toBe(0);
		expect(absoluteIndex(2, 4, 1)).toBe(9);
	});

	it("derives page size from terminal rows", () => {
		expect(pageSizeFor(30, 6)).toBe(24);
		expect(pageSizeFor(4, 6)).toBe(1);
	});
});
