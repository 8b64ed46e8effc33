import { DnsCodecError } from './errors.js';

export const PACKET_BUFFER_CAPACITY = 512;
export const DEFAULT_MAX_COMPRESSION_JUMPS = 5;
export const MAX_LABEL_BYTES = 63;

export const rangeBoundPolicies = ['legacy', 'exclusive'] as const;

/**
 * How `peekRange` treats a range ending exactly at the buffer capacity.
 *
 * - `legacy`: rejects `start + len >= capacity`, so the final byte of the buffer
 *   can never be the last byte of a peeked range.
 * - `exclusive`: rejects only `start + len > capacity`.
 */
export type RangeBoundPolicy = (typeof rangeBoundPolicies)[number];

export interface PacketBufferOptions {
  rangeBound?: RangeBoundPolicy;
  maxCompressionJumps?: number;
}

const textDecoder = new TextDecoder('utf-8');
const textEncoder = new TextEncoder();

function overrun(what: string, offset: number): DnsCodecError {
  return new DnsCodecError('BUFFER_OVERRUN', `DNS ${what} out of bounds at offset ${offset}`);
}

function assertUint(value: number, max: number, what: string): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new DnsCodecError('VALUE_OUT_OF_RANGE', `DNS ${what} value out of range: ${value}`);
  }
}

/**
 * Fixed-capacity DNS datagram buffer with a single shared cursor.
 *
 * Primitive reads and writes check their whole width up front, and writes check
 * that the value fits the field: on failure neither the contents nor the cursor
 * change.
 */
export class PacketBuffer {
  readonly buf = new Uint8Array(PACKET_BUFFER_CAPACITY);
  private pos = 0;
  private readonly rangeBound: RangeBoundPolicy;
  private readonly maxCompressionJumps: number;

  constructor(opts: PacketBufferOptions = {}) {
    this.rangeBound = opts.rangeBound ?? 'legacy';
    this.maxCompressionJumps = opts.maxCompressionJumps ?? DEFAULT_MAX_COMPRESSION_JUMPS;
  }

  static from(bytes: Uint8Array, opts: PacketBufferOptions = {}): PacketBuffer {
    if (bytes.length > PACKET_BUFFER_CAPACITY) {
      throw new DnsCodecError(
        'BUFFER_OVERRUN',
        `DNS message too large: ${bytes.length} > ${PACKET_BUFFER_CAPACITY} bytes`,
      );
    }
    const buffer = new PacketBuffer(opts);
    buffer.buf.set(bytes);
    return buffer;
  }

  position(): number {
    return this.pos;
  }

  advance(steps: number): void {
    this.pos += steps;
  }

  seek(pos: number): void {
    this.pos = pos;
  }

  reset(): void {
    this.buf.fill(0);
    this.pos = 0;
  }

  /** Copy of everything before the cursor; what an encode produced. */
  written(): Uint8Array {
    return this.buf.slice(0, Math.min(Math.max(this.pos, 0), PACKET_BUFFER_CAPACITY));
  }

  private ensureAvailable(width: number, what: string): void {
    if (this.pos < 0 || this.pos + width > PACKET_BUFFER_CAPACITY) throw overrun(what, this.pos);
  }

  readByte(): number {
    this.ensureAvailable(1, 'read');
    const value = this.buf[this.pos]!;
    this.pos += 1;
    return value;
  }

  peekByte(pos: number): number {
    if (pos < 0 || pos >= PACKET_BUFFER_CAPACITY) throw overrun('peek', pos);
    return this.buf[pos]!;
  }

  peekRange(start: number, len: number): Uint8Array {
    const end = start + len;
    const outOfRange = this.rangeBound === 'legacy' ? end >= PACKET_BUFFER_CAPACITY : end > PACKET_BUFFER_CAPACITY;
    if (start < 0 || len < 0 || outOfRange) throw overrun('range', start);
    return this.buf.subarray(start, end);
  }

  readU16(): number {
    this.ensureAvailable(2, 'read');
    return (this.readByte() << 8) | this.readByte();
  }

  readU32(): number {
    this.ensureAvailable(4, 'read');
    return ((this.readByte() << 24) | (this.readByte() << 16) | (this.readByte() << 8) | this.readByte()) >>> 0;
  }

  private put(value: number): void {
    this.buf[this.pos] = value & 0xff;
    this.pos += 1;
  }

  writeByte(value: number): void {
    assertUint(value, 0xff, 'u8');
    this.ensureAvailable(1, 'write');
    this.put(value);
  }

  writeU16(value: number): void {
    assertUint(value, 0xffff, 'u16');
    this.ensureAvailable(2, 'write');
    this.put(value >>> 8);
    this.put(value);
  }

  writeU32(value: number): void {
    assertUint(value, 0xffffffff, 'u32');
    this.ensureAvailable(4, 'write');
    this.put(value >>> 24);
    this.put(value >>> 16);
    this.put(value >>> 8);
    this.put(value);
  }

  /**
   * Decodes a possibly compressed name (RFC 1035 4.1.4) starting at the cursor.
   *
   * `pos` tracks where this loop is reading and is rewound freely by pointers. The
   * shared cursor moves once: past the first pointer if there is one, otherwise
   * past the terminating zero label.
   */
  readDomainName(): string {
    const labels: string[] = [];
    let pos = this.pos;
    let jumped = false;
    let jumps = 0;

    while (true) {
      const length = this.peekByte(pos);

      if ((length & 0xc0) === 0xc0) {
        jumps += 1;
        if (jumps > this.maxCompressionJumps) {
          throw new DnsCodecError(
            'COMPRESSION_LOOP_EXCEEDED',
            `DNS name exceeded ${this.maxCompressionJumps} compression jumps`,
          );
        }
        const low = this.peekByte(pos + 1);
        if (!jumped) {
          this.seek(pos + 2);
          jumped = true;
        }
        pos = ((length & 0x3f) << 8) | low;
        continue;
      }

      pos += 1;
      if (length === 0) break;

      labels.push(textDecoder.decode(this.peekRange(pos, length)).toLowerCase());
      pos += length;
    }

    if (!jumped) this.seek(pos);
    return labels.join('.');
  }

  /** Writes `name` as uncompressed labels. A single trailing dot is accepted. */
  writeDomainName(name: string): void {
    const trimmed = name.endsWith('.') ? name.slice(0, -1) : name;
    const labels: Uint8Array[] = [];
    let totalBytes = 1;
    if (trimmed !== '') {
      for (const label of trimmed.split('.')) {
        const bytes = textEncoder.encode(label);
        if (bytes.length === 0) {
          throw new DnsCodecError('EMPTY_LABEL', `DNS name has an empty label: ${name}`);
        }
        if (bytes.length > MAX_LABEL_BYTES) {
          throw new DnsCodecError('LABEL_TOO_LONG', `DNS label exceeds ${MAX_LABEL_BYTES} bytes: ${label}`);
        }
        labels.push(bytes);
        totalBytes += 1 + bytes.length;
      }
    }

    this.ensureAvailable(totalBytes, 'write');
    for (const label of labels) {
      this.put(label.length);
      for (const b of label) this.put(b);
    }
    this.put(0);
  }
}
