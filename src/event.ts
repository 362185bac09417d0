import {
  ACTOR_NAME_BYTES,
  MAX_ACTOR_ID,
  RESOURCE_PATH_BYTES,
  type AccessEvent,
} from './types.js';

export interface AccessEventFields {
  actorId: number;
  ownerId?: number;
  actorName?: string;
  resourcePath: string;
  flags?: number;
}

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

export function isUint32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_ACTOR_ID;
}

function isInt32(value: number): boolean {
  return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;
}

/**
 * Cut a string field the way the capture side stores it: at most
 * `maxBytes` of UTF-8, ending at the first NUL.
 */
export function boundedString(value: string | Uint8Array, maxBytes: number): string {
  const bytes = typeof value === 'string' ? Buffer.from(value, 'utf8') : Buffer.from(value);
  const field = bytes.subarray(0, maxBytes);
  const nul = field.indexOf(0);
  return (nul === -1 ? field : field.subarray(0, nul)).toString('utf8');
}

export function createAccessEvent(fields: AccessEventFields): AccessEvent {
  const { actorId, ownerId = 0, flags = 0 } = fields;
  if (!isUint32(actorId)) {
    throw new RangeError(`actorId must be a uint32, got ${actorId}`);
  }
  if (!isUint32(ownerId)) {
    throw new RangeError(`ownerId must be a uint32, got ${ownerId}`);
  }
  if (!isInt32(flags)) {
    throw new RangeError(`flags must be an int32, got ${flags}`);
  }
  return Object.freeze({
    actorId,
    ownerId,
    actorName: boundedString(fields.actorName ?? '', ACTOR_NAME_BYTES),
    resourcePath: boundedString(fields.resourcePath, RESOURCE_PATH_BYTES),
    flags,
  });
}
