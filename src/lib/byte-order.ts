// Copyright 2013 Stephen Vickers <stephen.vickers.sv@gmail.com>

import { SmartBuffer } from "smart-buffer";
import { ByteOrder } from "./constants.js";
import { InvalidDataCode, InvalidDataError } from "./errors.js";

const MAX_UNSIGNED_INT8 = 255;
const MAX_UNSIGNED_INT16 = 65535;
const MIN_SIGNED_INT32 = -2147483648;
const MAX_SIGNED_INT32 = 2147483647;
const MAX_UNSIGNED_INT32 = 4294967295;
const MAX_UNSIGNED_INT64 = 18446744073709551615n;

function checkInteger (value: number, min: number, max: number, label: string): void {
    if ( ! Number.isInteger (value) ) {
        throw new InvalidDataError ("Value to write as " + label + " " + value
                + " is not an integer", InvalidDataCode.EOutOfRange);
    }
    if ( value < min || value > max ) {
        throw new InvalidDataError ("Value to write " + value + " is outside the "
                + label + " range", InvalidDataCode.EOutOfRange);
    }
}

function checkAvailable (available: number, width: number): void {
    if ( available < width ) {
        throw new InvalidDataError ("Need " + width + " bytes but only "
                + Math.max (available, 0) + " remain", InvalidDataCode.ETruncated);
    }
}

/*****************************************************************************
 ** Fixed-width integers <-> bytes
 **/

export function uint16ToBytes (value: number, byteOrder: ByteOrder): Buffer {
    checkInteger (value, 0, MAX_UNSIGNED_INT16, "unsigned 16-bit");
    const bytes = Buffer.alloc (2);
    if ( byteOrder == ByteOrder.BigEndian )
        bytes.writeUInt16BE (value);
    else
        bytes.writeUInt16LE (value);
    return bytes;
}

export function bytesToUint16 (bytes: Buffer, byteOrder: ByteOrder, offset = 0): number {
    checkAvailable (bytes.length - offset, 2);
    return byteOrder == ByteOrder.BigEndian
            ? bytes.readUInt16BE (offset)
            : bytes.readUInt16LE (offset);
}

export function uint32ToBytes (value: number, byteOrder: ByteOrder): Buffer {
    checkInteger (value, 0, MAX_UNSIGNED_INT32, "unsigned 32-bit");
    const bytes = Buffer.alloc (4);
    if ( byteOrder == ByteOrder.BigEndian )
        bytes.writeUInt32BE (value);
    else
        bytes.writeUInt32LE (value);
    return bytes;
}

export function bytesToUint32 (bytes: Buffer, byteOrder: ByteOrder, offset = 0): number {
    checkAvailable (bytes.length - offset, 4);
    return byteOrder == ByteOrder.BigEndian
            ? bytes.readUInt32BE (offset)
            : bytes.readUInt32LE (offset);
}

export function int32ToBytes (value: number, byteOrder: ByteOrder): Buffer {
    checkInteger (value, MIN_SIGNED_INT32, MAX_SIGNED_INT32, "signed 32-bit");
    const bytes = Buffer.alloc (4);
    if ( byteOrder == ByteOrder.BigEndian )
        bytes.writeInt32BE (value);
    else
        bytes.writeInt32LE (value);
    return bytes;
}

export function bytesToInt32 (bytes: Buffer, byteOrder: ByteOrder, offset = 0): number {
    checkAvailable (bytes.length - offset, 4);
    return byteOrder == ByteOrder.BigEndian
            ? bytes.readInt32BE (offset)
            : bytes.readInt32LE (offset);
}

export function uint64ToBytes (value: bigint, byteOrder: ByteOrder): Buffer {
    if ( value < 0n || value > MAX_UNSIGNED_INT64 ) {
        throw new InvalidDataError ("Value to write " + value
                + " is outside the unsigned 64-bit range", InvalidDataCode.EOutOfRange);
    }
    const bytes = Buffer.alloc (8);
    if ( byteOrder == ByteOrder.BigEndian )
        bytes.writeBigUInt64BE (value);
    else
        bytes.writeBigUInt64LE (value);
    return bytes;
}

export function bytesToUint64 (bytes: Buffer, byteOrder: ByteOrder, offset = 0): bigint {
    checkAvailable (bytes.length - offset, 8);
    return byteOrder == ByteOrder.BigEndian
            ? bytes.readBigUInt64BE (offset)
            : bytes.readBigUInt64LE (offset);
}

/*****************************************************************************
 ** SmartBuffer cursor helpers
 **/

export function ensureReadable (reader: SmartBuffer, length: number): void {
    checkAvailable (reader.remaining (), length);
}

export function readUInt8 (reader: SmartBuffer): number {
    ensureReadable (reader, 1);
    return reader.readUInt8 ();
}

export function readUInt16 (reader: SmartBuffer, byteOrder: ByteOrder): number {
    ensureReadable (reader, 2);
    return byteOrder == ByteOrder.BigEndian ? reader.readUInt16BE () : reader.readUInt16LE ();
}

export function readUInt32 (reader: SmartBuffer, byteOrder: ByteOrder): number {
    ensureReadable (reader, 4);
    return byteOrder == ByteOrder.BigEndian ? reader.readUInt32BE () : reader.readUInt32LE ();
}

export function readInt32 (reader: SmartBuffer, byteOrder: ByteOrder): number {
    ensureReadable (reader, 4);
    return byteOrder == ByteOrder.BigEndian ? reader.readInt32BE () : reader.readInt32LE ();
}

export function readUInt64 (reader: SmartBuffer, byteOrder: ByteOrder): bigint {
    ensureReadable (reader, 8);
    return byteOrder == ByteOrder.BigEndian
            ? reader.readBigUInt64BE ()
            : reader.readBigUInt64LE ();
}

export function readBytes (reader: SmartBuffer, length: number): Buffer {
    ensureReadable (reader, length);
    return reader.readBuffer (length);
}

export function writeUInt8 (buffer: SmartBuffer, value: number): void {
    checkInteger (value, 0, MAX_UNSIGNED_INT8, "unsigned 8-bit");
    buffer.writeUInt8 (value);
}

export function writeUInt16 (buffer: SmartBuffer, value: number, byteOrder: ByteOrder): void {
    buffer.writeBuffer (uint16ToBytes (value, byteOrder));
}

export function writeUInt32 (buffer: SmartBuffer, value: number, byteOrder: ByteOrder): void {
    buffer.writeBuffer (uint32ToBytes (value, byteOrder));
}

export function writeInt32 (buffer: SmartBuffer, value: number, byteOrder: ByteOrder): void {
    buffer.writeBuffer (int32ToBytes (value, byteOrder));
}

export function writeUInt64 (buffer: SmartBuffer, value: bigint, byteOrder: ByteOrder): void {
    buffer.writeBuffer (uint64ToBytes (value, byteOrder));
}

export function writePadding (buffer: SmartBuffer, length: number): void {
    for ( let i = 0; i < length; i++ ) {
        buffer.writeUInt8 (0);
    }
}

// Reader over the next `length` bytes only; the parent cursor moves past them
export function readSlice (reader: SmartBuffer, length: number): SmartBuffer {
    return SmartBuffer.fromBuffer (readBytes (reader, length));
}
