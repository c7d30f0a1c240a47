/**
 * Wire runtime contract
 *
 * Generated encode/decode functions call these methods and nothing else.
 * The wire layout behind them (varints, framing, block sizes) belongs to
 * the runtime that implements them.
 */

export interface Encoder {
  writeNull(): void;
  writeBoolean(value: boolean): void;
  writeInt(value: number): void;
  writeLong(value: bigint): void;
  writeFloat(value: number): void;
  writeDouble(value: number): void;
  writeString(value: string): void;
  writeBytes(value: Uint8Array): void;
  /** Writes exactly `value.length` bytes with no length prefix */
  writeFixed(value: Uint8Array): void;
  writeEnum(ordinal: number): void;
  writeUnionIndex(index: number): void;
  writeArrayStart(count: number): void;
  writeArrayEnd(): void;
  writeMapStart(count: number): void;
  writeMapEnd(): void;
}

export interface Decoder {
  readNull(): null;
  readBoolean(): boolean;
  readInt(): number;
  readLong(): bigint;
  readFloat(): number;
  readDouble(): number;
  readString(): string;
  readBytes(): Uint8Array;
  readFixed(size: number): Uint8Array;
  readEnum(): number;
  readUnionIndex(): number;
  /** Returns the number of items that follow */
  readArrayStart(): number;
  readArrayEnd(): void;
  /** Returns the number of entries that follow */
  readMapStart(): number;
  readMapEnd(): void;
}
