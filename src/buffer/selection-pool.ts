/**
 * Selection buffer pool.
 *
 * Compiled row filters write matching row positions into a scratch
 * Uint32Array before the positions are copied into an immutable RowIndex.
 * The pool hands those scratch buffers out and takes them back so repeated
 * selections over large frames do not allocate one per call.
 */

const DEFAULT_POOL_SIZE = 16;

/**
 * Pool of reusable Uint32Array buffers, bucketed by power-of-two capacity.
 */
export class SelectionBufferPool {
	private readonly pools = new Map<number, Uint32Array[]>();
	private readonly maxPoolSize: number;

	constructor(maxPoolSize: number = DEFAULT_POOL_SIZE) {
		this.maxPoolSize = maxPoolSize;
	}

	/**
	 * Acquire a zeroed buffer of exactly `size` elements.
	 */
	acquire(size: number): Uint32Array {
		const bucketSize = this.roundUpSize(size);
		const buffer = this.pools.get(bucketSize)?.pop();
		if (buffer !== undefined) {
			buffer.fill(0);
			return buffer.subarray(0, size);
		}
		return new Uint32Array(bucketSize).subarray(0, size);
	}

	/**
	 * Return a buffer obtained from `acquire`. Buffers beyond the per-bucket
	 * limit are dropped.
	 */
	release(buffer: Uint32Array): void {
		const bucketSize = buffer.buffer.byteLength / Uint32Array.BYTES_PER_ELEMENT;

		let pool = this.pools.get(bucketSize);
		if (!pool) {
			pool = [];
			this.pools.set(bucketSize, pool);
		}
		if (pool.length < this.maxPoolSize && !pool.some((b) => b.buffer === buffer.buffer)) {
			pool.push(new Uint32Array(buffer.buffer));
		}
	}

	/**
	 * Run `fn` with a borrowed buffer of `size` elements, releasing it after.
	 * The buffer must not escape `fn`.
	 */
	borrow<T>(size: number, fn: (buffer: Uint32Array) => T): T {
		const buffer = this.acquire(size);
		try {
			return fn(buffer);
		} finally {
			this.release(buffer);
		}
	}

	clear(): void {
		this.pools.clear();
	}

	getStats(): { totalBuffers: number; totalBytes: number } {
		let totalBuffers = 0;
		let totalBytes = 0;
		for (const [size, pool] of this.pools) {
			totalBuffers += pool.length;
			totalBytes += pool.length * size * Uint32Array.BYTES_PER_ELEMENT;
		}
		return { totalBuffers, totalBytes };
	}

	private roundUpSize(size: number): number {
		if (size <= 64) return 64;
		return 2 ** Math.ceil(Math.log2(size));
	}
}

/** Shared pool used by RowIndex.fromFilterFunction. */
export const selectionPool = new SelectionBufferPool();
