import { writeSync } from "node:fs";

/**
 * Destination for rendered table text. Writes are synchronous; a sink
 * reports failure by throwing.
 */
export interface OutputSink {
	write(chunk: string): void;
}

/**
 * In-memory sink that accumulates everything written to it.
 */
export interface BufferSink extends OutputSink {
	toString(): string;
	clear(): void;
}

export function createBufferSink(): BufferSink {
	let buffer = "";
	return {
		write(chunk: string) {
			buffer += chunk;
		},
		toString() {
			return buffer;
		},
		clear() {
			buffer = "";
		},
	};
}

const RETRY_DELAY_MS = 1;
const retryClock = new Int32Array(new SharedArrayBuffer(4));

function isRetryable(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "EAGAIN";
}

/**
 * Sink writing straight to a file descriptor (stdout by default) with
 * synchronous writes, so errors surface from `write` itself. Short writes
 * are continued and `EAGAIN` from a full non-blocking pipe is retried until
 * the whole chunk is out.
 */
export function createFdSink(fd: number = process.stdout.fd): OutputSink {
	return {
		write(chunk: string) {
			const data = Buffer.from(chunk, "utf8");
			let offset = 0;
			while (offset < data.length) {
				try {
					offset += writeSync(fd, data, offset, data.length - offset);
				} catch (error) {
					if (!isRetryable(error)) throw error;
					Atomics.wait(retryClock, 0, 0, RETRY_DELAY_MS);
				}
			}
		},
	};
}
