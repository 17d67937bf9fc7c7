import { Buffer } from 'node:buffer';

import { PLIST_LIMITS } from '../config/constants.js';
import { FormatError } from '../errors/conversion-errors.js';
import type { DecodeOptions, PlistValue } from './types.js';

// ---------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------

const MAGIC = 'bplist';
const HEADER_LENGTH = 8;
const TRAILER_LENGTH = 32;
const APPLE_EPOCH_MS = Date.UTC(2001, 0, 1);
const EXTENDED_LENGTH = 0x0f;

interface Trailer {
  offsetIntSize: number;
  objectRefSize: number;
  objectCount: number;
  rootIndex: number;
  offsetTableOffset: number;
}

interface Span {
  start: number;
  count: number;
}

function fail(message: string): never {
  throw new FormatError(message, 'plist');
}

function isDigit(byte: number): boolean {
  return byte >= 0x30 && byte <= 0x39;
}

/**
 * True when `bytes` opens with the `bplist0x` header. Newer `bplist1x`
 * variants use a different object encoding and are not accepted.
 */
export function hasBinaryPlistHeader(bytes: Uint8Array): boolean {
  if (bytes.byteLength < HEADER_LENGTH) return false;
  const magic = Buffer.from(bytes.buffer, bytes.byteOffset, MAGIC.length);
  return (
    magic.toString('latin1') === MAGIC &&
    bytes[6] === 0x30 &&
    isDigit(bytes[7] ?? 0)
  );
}

// ---------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------

class BinaryPlistReader {
  private readonly view: DataView;
  private readonly trailer: Trailer;
  private readonly maxDepth: number;
  private readonly decoded = new Map<number, PlistValue>();
  private readonly inProgress = new Set<number>();

  constructor(
    private readonly bytes: Uint8Array,
    options: DecodeOptions
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.maxDepth = options.maxDepth ?? PLIST_LIMITS.MAX_DEPTH;
    this.trailer = this.readTrailer();
  }

  decodeRoot(): PlistValue {
    return this.decodeObject(this.trailer.rootIndex, 0);
  }

  /** End of the object table; every object byte lies before it. */
  private get objectsEnd(): number {
    return this.trailer.offsetTableOffset;
  }

  private readTrailer(): Trailer {
    const base = this.bytes.byteLength - TRAILER_LENGTH;
    const offsetIntSize = this.view.getUint8(base + 6);
    const objectRefSize = this.view.getUint8(base + 7);
    const objectCount = this.readUnsigned(base + 8, 8);
    const rootIndex = this.readUnsigned(base + 16, 8);
    const offsetTableOffset = this.readUnsigned(base + 24, 8);

    if (offsetIntSize < 1 || offsetIntSize > 8) {
      fail(`Invalid offset table entry size ${offsetIntSize}`);
    }
    if (objectRefSize < 1 || objectRefSize > 8) {
      fail(`Invalid object reference size ${objectRefSize}`);
    }
    if (objectCount < 1) fail('Property list contains no objects');
    if (rootIndex >= objectCount) {
      fail(`Root object ${rootIndex} is outside the ${objectCount} objects`);
    }
    if (offsetTableOffset < HEADER_LENGTH || offsetTableOffset > base) {
      fail(`Offset table offset ${offsetTableOffset} is out of bounds`);
    }
    if (objectCount > (base - offsetTableOffset) / offsetIntSize) {
      fail('Offset table runs into the trailer');
    }

    return {
      offsetIntSize,
      objectRefSize,
      objectCount,
      rootIndex,
      offsetTableOffset,
    };
  }

  private readUnsigned(offset: number, width: number): number {
    let value = 0;
    for (let i = 0; i < width; i += 1) {
      value = value * 256 + this.view.getUint8(offset + i);
      if (value > Number.MAX_SAFE_INTEGER) {
        fail(`Integer at offset ${offset} is too large`);
      }
    }
    return value;
  }

  private ensureRange(start: number, length: number): void {
    if (start < HEADER_LENGTH || start + length > this.objectsEnd) {
      fail(`Object data at offset ${start} extends past the object table`);
    }
  }

  private offsetOf(index: number): number {
    if (index >= this.trailer.objectCount) {
      fail(`Object reference ${index} is out of range`);
    }
    const { offsetIntSize, offsetTableOffset } = this.trailer;
    const offset = this.readUnsigned(
      offsetTableOffset + index * offsetIntSize,
      offsetIntSize
    );
    if (offset < HEADER_LENGTH || offset >= this.objectsEnd) {
      fail(`Object ${index} has out-of-bounds offset ${offset}`);
    }
    return offset;
  }

  private decodeObject(index: number, depth: number): PlistValue {
    const cached = this.decoded.get(index);
    if (cached) return cached;

    if (depth > this.maxDepth) {
      fail(`Nesting exceeds ${this.maxDepth} levels`);
    }
    if (this.inProgress.has(index)) {
      fail(`Object ${index} references itself`);
    }

    this.inProgress.add(index);
    const value = this.parseObject(this.offsetOf(index), depth);
    this.inProgress.delete(index);
    this.decoded.set(index, value);
    return value;
  }

  private parseObject(offset: number, depth: number): PlistValue {
    const marker = this.view.getUint8(offset);
    const type = marker >> 4;
    const info = marker & 0x0f;

    switch (type) {
      case 0x0:
        return this.parseSingleton(marker, offset);
      case 0x1:
        return { kind: 'integer', value: this.parseInteger(offset, info) };
      case 0x2:
        return { kind: 'real', value: this.parseReal(offset, info) };
      case 0x3:
        if (info !== 0x3) break;
        return {
          kind: 'date',
          value: new Date(
            APPLE_EPOCH_MS + Math.round(this.parseReal(offset, 3) * 1000)
          ),
        };
      case 0x4: {
        const { start, count } = this.readSpan(offset, info, 1);
        return { kind: 'data', value: this.bytes.slice(start, start + count) };
      }
      case 0x5: {
        const { start, count } = this.readSpan(offset, info, 1);
        return { kind: 'string', value: this.decodeText(start, count, 'latin1') };
      }
      case 0x6: {
        const { start, count } = this.readSpan(offset, info, 2);
        return { kind: 'string', value: this.decodeUtf16(start, count) };
      }
      case 0x7: {
        const { start, count } = this.readSpan(offset, info, 1);
        return { kind: 'string', value: this.decodeText(start, count, 'utf8') };
      }
      case 0x8:
        this.ensureRange(offset + 1, info + 1);
        return {
          kind: 'uid',
          value: BigInt(this.readUnsigned(offset + 1, info + 1)),
        };
      case 0xa:
      case 0xc:
        return { kind: 'array', value: this.parseArray(offset, info, depth) };
      case 0xd:
        return { kind: 'dict', value: this.parseDict(offset, info, depth) };
      default:
        break;
    }

    return fail(
      `Unknown object type 0x${marker.toString(16).padStart(2, '0')} at offset ${offset}`
    );
  }

  private parseSingleton(marker: number, offset: number): PlistValue {
    switch (marker) {
      case 0x00:
      case 0x0f:
        return { kind: 'null' };
      case 0x08:
        return { kind: 'boolean', value: false };
      case 0x09:
        return { kind: 'boolean', value: true };
      default:
        return fail(
          `Unknown object type 0x${marker.toString(16).padStart(2, '0')} at offset ${offset}`
        );
    }
  }

  private parseInteger(offset: number, info: number): bigint {
    if (info > 4) fail(`Invalid integer width at offset ${offset}`);
    const width = 1 << info;
    const start = offset + 1;
    this.ensureRange(start, width);

    switch (width) {
      case 1:
        return BigInt(this.view.getUint8(start));
      case 2:
        return BigInt(this.view.getUint16(start));
      case 4:
        return BigInt(this.view.getUint32(start));
      case 8:
        return this.view.getBigInt64(start);
      default:
        return (
          (this.view.getBigInt64(start) << 64n) +
          this.view.getBigUint64(start + 8)
        );
    }
  }

  private parseReal(offset: number, info: number): number {
    const start = offset + 1;
    if (info === 2) {
      this.ensureRange(start, 4);
      return this.view.getFloat32(start);
    }
    if (info === 3) {
      this.ensureRange(start, 8);
      return this.view.getFloat64(start);
    }
    return fail(`Invalid real width at offset ${offset}`);
  }

  /**
   * Resolves the element count of a variable-length object and the offset
   * its payload starts at. Counts of 15 or more follow the marker as an
   * integer object.
   */
  private readSpan(offset: number, info: number, unitSize: number): Span {
    let count = info;
    let start = offset + 1;

    if (info === EXTENDED_LENGTH) {
      this.ensureRange(start, 1);
      const lengthMarker = this.view.getUint8(start);
      if (lengthMarker >> 4 !== 0x1 || (lengthMarker & 0x0f) > 3) {
        fail(`Invalid length marker at offset ${start}`);
      }
      const width = 1 << (lengthMarker & 0x0f);
      this.ensureRange(start + 1, width);
      count = this.readUnsigned(start + 1, width);
      start += 1 + width;
    }

    this.ensureRange(start, count * unitSize);
    return { start, count };
  }

  private decodeText(
    start: number,
    length: number,
    encoding: 'latin1' | 'utf8'
  ): string {
    return Buffer.from(
      this.bytes.buffer,
      this.bytes.byteOffset + start,
      length
    ).toString(encoding);
  }

  private decodeUtf16(start: number, units: number): string {
    const copy = Buffer.from(this.bytes.subarray(start, start + units * 2));
    return copy.swap16().toString('utf16le');
  }

  private readRefs(start: number, count: number): number[] {
    const { objectRefSize } = this.trailer;
    const refs: number[] = [];
    for (let i = 0; i < count; i += 1) {
      refs.push(this.readUnsigned(start + i * objectRefSize, objectRefSize));
    }
    return refs;
  }

  private parseArray(
    offset: number,
    info: number,
    depth: number
  ): PlistValue[] {
    const { start, count } = this.readSpan(
      offset,
      info,
      this.trailer.objectRefSize
    );
    return this.readRefs(start, count).map((ref) =>
      this.decodeObject(ref, depth + 1)
    );
  }

  private parseDict(
    offset: number,
    info: number,
    depth: number
  ): Map<string, PlistValue> {
    const { objectRefSize } = this.trailer;
    const { start, count } = this.readSpan(offset, info, objectRefSize * 2);
    const keyRefs = this.readRefs(start, count);
    const valueRefs = this.readRefs(start + count * objectRefSize, count);

    const entries = new Map<string, PlistValue>();
    keyRefs.forEach((keyRef, i) => {
      const key = this.decodeObject(keyRef, depth + 1);
      if (key.kind !== 'string') {
        fail(`Dictionary key ${keyRef} is a ${key.kind}, not a string`);
      }
      const valueRef = valueRefs[i] ?? fail('Dictionary value missing');
      entries.set(key.value, this.decodeObject(valueRef, depth + 1));
    });
    return entries;
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Decodes an Apple binary property list (`bplist00`).
 *
 * Objects referenced from several containers are decoded once and shared
 * within the returned tree. Reference cycles, out-of-range offsets and
 * nesting past `maxDepth` throw a {@link FormatError}.
 */
export function decodeBinaryPlist(
  bytes: Uint8Array,
  options: DecodeOptions = {}
): PlistValue {
  if (!hasBinaryPlistHeader(bytes)) {
    fail('Missing bplist00 header');
  }
  if (bytes.byteLength < HEADER_LENGTH + TRAILER_LENGTH + 1) {
    fail(`Property list is truncated (${bytes.byteLength} bytes)`);
  }
  return new BinaryPlistReader(bytes, options).decodeRoot();
}
