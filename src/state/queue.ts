/**
 * Play queue: the traversal order over playlist positions.
 *
 * The queue is always the identity order or a full permutation of
 * `0..length`. It is never patched in place; any change to the playlist
 * length or the shuffle flag builds a fresh one and the cursor restarts at 0.
 */

export type RandomSource = () => number;

export interface QueuePosition {
	queue: readonly number[];
	index: number;
}

/**
 * Build a traversal order over `length` items.
 * Sequential order when `shuffle` is false, otherwise a uniform
 * Fisher-Yates permutation.
 */
export function buildQueue(
	length: number,
	shuffle: boolean,
	random: RandomSource = Math.random,
): number[] {
	const indices = Array.from({ length: Math.max(0, length) }, (_, i) => i);
	if (!shuffle) {
		return indices;
	}

	for (let i = indices.length - 1; i > 0; i--) {
		const j = Math.floor(random() * (i + 1));
		[indices[i], indices[j]] = [indices[j], indices[i]];
	}
	return indices;
}

/**
 * Step forward. At the last position the queue is exhausted and is rebuilt
 * (re-shuffled when shuffle is on) with the cursor back at 0.
 */
export function advanceQueue(
	position: QueuePosition,
	playlistLength: number,
	shuffle: boolean,
	random: RandomSource = Math.random,
): QueuePosition {
	if (position.index < position.queue.length - 1) {
		return { queue: position.queue, index: position.index + 1 };
	}
	return { queue: buildQueue(playlistLength, shuffle, random), index: 0 };
}

/**
 * Step back; no wraparound at the start
 */
export function retreatQueue(position: QueuePosition): QueuePosition {
	if (position.index > 0) {
		return { queue: position.queue, index: position.index - 1 };
	}
	return position;
}

/**
 * Playlist index at the cursor, or null when the queue is empty
 */
export function currentQueueItem(position: QueuePosition): number | null {
	const item = position.queue[position.index];
	return item === undefined ? null : item;
}
