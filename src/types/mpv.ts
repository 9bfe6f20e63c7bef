/**
 * mpv IPC Types
 */

/**
 * Decoded event from the mpv JSON IPC stream
 */
export type MpvEvent =
	| { type: "StartFile" }
	/** `reason` is mpv's end-file reason; "eof" means the track played to completion */
	| { type: "EndFile"; reason: string }
	| { type: "Unknown"; raw: string }
	/** The IPC connection closed or failed after it was established */
	| { type: "Disconnected"; error?: string };

/**
 * The playback channel the backend coordinator drives
 */
export interface IPlaybackChannel {
	/** Load a URL, replacing whatever mpv currently holds */
	loadFile(url: string): Promise<void>;
	/** Start the loaded track */
	play(): Promise<void>;
	pause(): Promise<void>;
	resume(): Promise<void>;
	/** Next decoded event, in arrival order */
	recv(): Promise<MpvEvent>;
	isConnected(): boolean;
	close(): void;
}
