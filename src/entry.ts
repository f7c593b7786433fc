export type IntegerKind = 'int8' | 'int16' | 'int32' | 'uint8' | 'uint16' | 'uint32';
export type BigIntegerKind = 'int64' | 'uint64';
export type FloatKind = 'float32' | 'float64';

/** The closed set of element kinds a filter can hold */
export type EntryKind = IntegerKind | BigIntegerKind | FloatKind | 'string';

/** JavaScript value type used for entries of kind `K` */
export type EntryOf<K extends EntryKind> = K extends 'string'
  ? string
  : K extends BigIntegerKind
    ? bigint
    : number;

/**
 * How entries of one kind are normalized and represented for hashing.
 */
export interface EntryCodec<T> {
  /** Brings a value to the form a typed store of this kind would hold */
  canonical(value: T): T;
  /** Native little-endian bit pattern (UTF-8 for strings) */
  toBytes(value: T): Uint8Array;
  /** Locale-independent, lossless text form */
  toText(value: T): string;
}

type NumberWriter = (view: DataView, value: number) => void;
type NumberReader = (view: DataView) => number;

const encoder = new TextEncoder();
const scratch = new DataView(new ArrayBuffer(8));

function writeBytes<T>(byteLength: number, value: T, write: (view: DataView, value: T) => void): Uint8Array {
  const bytes = new Uint8Array(byteLength);
  write(new DataView(bytes.buffer), value);
  return bytes;
}

// DataView setters apply the same ToIntN/ToUintN conversion a typed store would.
function integerCodec(byteLength: number, write: NumberWriter, read: NumberReader): EntryCodec<number> {
  return {
    canonical(value) {
      write(scratch, value);
      return read(scratch);
    },
    toBytes: (value) => writeBytes(byteLength, value, write),
    toText: (value) => String(value),
  };
}

function bigIntegerCodec(signed: boolean): EntryCodec<bigint> {
  const write = (view: DataView, value: bigint): void => {
    if (signed) {
      view.setBigInt64(0, value, true);
    } else {
      view.setBigUint64(0, value, true);
    }
  };
  return {
    canonical: (value) => (signed ? BigInt.asIntN(64, value) : BigInt.asUintN(64, value)),
    toBytes: (value) => writeBytes(8, value, write),
    toText: (value) => value.toString(),
  };
}

function floatCodec(byteLength: 4 | 8): EntryCodec<number> {
  const write = (view: DataView, value: number): void => {
    if (byteLength === 4) {
      view.setFloat32(0, value, true);
    } else {
      view.setFloat64(0, value, true);
    }
  };
  return {
    canonical(value) {
      const rounded = byteLength === 4 ? Math.fround(value) : value;
      if (Number.isNaN(rounded)) return NaN;
      // -0 and 0 compare equal, so they must hash equal
      return rounded === 0 ? 0 : rounded;
    },
    toBytes: (value) => writeBytes(byteLength, value, write),
    toText: (value) => String(value),
  };
}

const stringCodec: EntryCodec<string> = {
  canonical: (value) => value,
  toBytes: (value) => encoder.encode(value),
  // already textual, no formatting round-trip
  toText: (value) => value,
};

const CODECS: { [K in EntryKind]: EntryCodec<EntryOf<K>> } = {
  int8: integerCodec(1, (v, x) => v.setInt8(0, x), (v) => v.getInt8(0)),
  int16: integerCodec(2, (v, x) => v.setInt16(0, x, true), (v) => v.getInt16(0, true)),
  int32: integerCodec(4, (v, x) => v.setInt32(0, x, true), (v) => v.getInt32(0, true)),
  uint8: integerCodec(1, (v, x) => v.setUint8(0, x), (v) => v.getUint8(0)),
  uint16: integerCodec(2, (v, x) => v.setUint16(0, x, true), (v) => v.getUint16(0, true)),
  uint32: integerCodec(4, (v, x) => v.setUint32(0, x, true), (v) => v.getUint32(0, true)),
  int64: bigIntegerCodec(true),
  uint64: bigIntegerCodec(false),
  float32: floatCodec(4),
  float64: floatCodec(8),
  string: stringCodec,
};

export function isEntryKind(kind: unknown): kind is EntryKind {
  return typeof kind === 'string' && Object.hasOwn(CODECS, kind);
}

/** All supported entry kinds */
export const ENTRY_KINDS: readonly EntryKind[] = Object.keys(CODECS).filter(isEntryKind);

/**
 * Returns the codec for `kind`.
 * @throws {TypeError} If `kind` is not one of the supported entry kinds
 */
export function codecFor<K extends EntryKind>(kind: K): EntryCodec<EntryOf<K>> {
  if (!isEntryKind(kind)) {
    throw new TypeError(
      `Unsupported entry kind: ${String(kind)} (expected one of ${ENTRY_KINDS.join(', ')})`
    );
  }
  return CODECS[kind];
}
