/**
 * Fixed-width binary records exchanged with the capture helper.
 *
 * Event record, 284 bytes, little-endian:
 *
 *   offset  size  field
 *        0     4  actorId       uint32
 *        4     4  ownerId       uint32
 *        8    16  actorName     NUL-padded bytes
 *       24   256  resourcePath  NUL-padded bytes
 *      280     4  flags         int32
 *
 * Block command, 4 bytes: the actor id as a little-endian uint32.
 */

import { boundedString, createAccessEvent } from './event.js';
import { ACTOR_NAME_BYTES, RESOURCE_PATH_BYTES, type AccessEvent } from './types.js';

const ACTOR_ID_OFFSET = 0;
const OWNER_ID_OFFSET = 4;
const ACTOR_NAME_OFFSET = 8;
const RESOURCE_PATH_OFFSET = ACTOR_NAME_OFFSET + ACTOR_NAME_BYTES;
const FLAGS_OFFSET = RESOURCE_PATH_OFFSET + RESOURCE_PATH_BYTES;

export const EVENT_RECORD_SIZE = FLAGS_OFFSET + 4;
export const BLOCK_COMMAND_SIZE = 4;

export function decodeEventRecord(record: Uint8Array): AccessEvent {
  if (record.length !== EVENT_RECORD_SIZE) {
    throw new RangeError(
      `event record must be ${EVENT_RECORD_SIZE} bytes, got ${record.length}`
    );
  }
  const buf = Buffer.from(record.buffer, record.byteOffset, record.byteLength);
  return createAccessEvent({
    actorId: buf.readUInt32LE(ACTOR_ID_OFFSET),
    ownerId: buf.readUInt32LE(OWNER_ID_OFFSET),
    actorName: boundedString(
      buf.subarray(ACTOR_NAME_OFFSET, RESOURCE_PATH_OFFSET),
      ACTOR_NAME_BYTES
    ),
    resourcePath: boundedString(
      buf.subarray(RESOURCE_PATH_OFFSET, FLAGS_OFFSET),
      RESOURCE_PATH_BYTES
    ),
    flags: buf.readInt32LE(FLAGS_OFFSET),
  });
}

export function encodeEventRecord(event: AccessEvent): Buffer {
  const buf = Buffer.alloc(EVENT_RECORD_SIZE);
  buf.writeUInt32LE(event.actorId, ACTOR_ID_OFFSET);
  buf.writeUInt32LE(event.ownerId, OWNER_ID_OFFSET);
  Buffer.from(event.actorName, 'utf8')
    .subarray(0, ACTOR_NAME_BYTES)
    .copy(buf, ACTOR_NAME_OFFSET);
  Buffer.from(event.resourcePath, 'utf8')
    .subarray(0, RESOURCE_PATH_BYTES)
    .copy(buf, RESOURCE_PATH_OFFSET);
  buf.writeInt32LE(event.flags, FLAGS_OFFSET);
  return buf;
}

export function encodeBlockCommand(actorId: number): Buffer {
  const buf = Buffer.alloc(BLOCK_COMMAND_SIZE);
  buf.writeUInt32LE(actorId, 0);
  return buf;
}
