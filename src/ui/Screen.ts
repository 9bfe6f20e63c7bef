import { ESCAPE_SEQUENCES, moveTo } from "../utils/terminal";

interface Cell {
	text: string;
	style: string;
}

/**
 * Line buffer for one frame
 * Components write whole rows; `toAnsi` turns the frame into a single write
 * that repaints every row.
 */
export class Screen {
	private rows: Cell[];

	constructor(
		readonly width: number,
		readonly height: number,
	) {
		this.rows = Array.from({ length: height }, () => ({ text: "", style: "" }));
	}

	/**
	 * Put text on a row, cut to the screen width. Rows outside the screen are ignored.
	 */
	put(row: number, text: string, style: string = ""): void {
		if (row < 0 || row >= this.height) {
			return;
		}
		this.rows[row] = { text: Array.from(text).slice(0, this.width).join(""), style };
	}

	/**
	 * Horizontal rule across the full width
	 */
	rule(row: number, style: string = ""): void {
		this.put(row, "─".repeat(this.width), style);
	}

	/**
	 * Unstyled row text, mostly for inspection
	 */
	line(row: number): string {
		return this.rows[row]?.text ?? "";
	}

	lines(): string[] {
		return this.rows.map((cell) => cell.text);
	}

	styleOf(row: number): string {
		return this.rows[row]?.style ?? "";
	}

	toAnsi(reset: string = ESCAPE_SEQUENCES.RESET_ATTRS): string {
		let frame = "";
		this.rows.forEach((cell, row) => {
			frame += moveTo(row) + ESCAPE_SEQUENCES.CLEAR_LINE;
			if (cell.style) {
				frame += `${cell.style}${cell.text}${reset}`;
			} else {
				frame += cell.text;
			}
		});
		return frame;
	}
}
