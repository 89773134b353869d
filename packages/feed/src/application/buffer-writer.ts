import type { BoundedBuffer } from "../domain/bounded-buffer.js";
import type { Channel } from "../lib/channel.js";
import { logger } from "../lib/logger.js";

const log = logger.createChild("bufferWriter");

/**
 * Drain a handoff channel into a bounded buffer until the channel closes.
 * Eviction happens inside BoundedBuffer.push. Resolves with the number of items written.
 */
export async function runBufferWriter<T extends NonNullable<unknown>>(
  name: string,
  channel: Channel<T>,
  buffer: BoundedBuffer<T>,
): Promise<number> {
  let written = 0;
  for await (const item of channel) {
    buffer.push(item);
    written++;
  }
  log.debug({ action: "writerStopped", buffer: name, written, dropped: channel.droppedCount }, "Buffer writer stopped");
  return written;
}
