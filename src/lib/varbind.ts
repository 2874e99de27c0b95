// Copyright 2013 Stephen Vickers <stephen.vickers.sv@gmail.com>

import { SmartBuffer } from "smart-buffer";
import {
    readInt32,
    readSlice,
    readUInt16,
    readUInt32,
    readUInt64,
    writeInt32,
    writeUInt16,
    writeUInt32,
    writeUInt64
} from "./byte-order.js";
import { ValueType, type ByteOrder } from "./constants.js";
import { InvalidDataCode, InvalidDataError } from "./errors.js";
import { OctetString } from "./octet-string.js";
import { ObjectIdentifier } from "./oid.js";

/*****************************************************************************
 ** Values (RFC 2741 section 5.4)
 **/

export type Value =
    | { type: typeof ValueType.Integer; value: number }
    | { type: typeof ValueType.OctetString; value: OctetString }
    | { type: typeof ValueType.Null }
    | { type: typeof ValueType.ObjectIdentifier; value: ObjectIdentifier }
    // octets ordered most significant first
    | { type: typeof ValueType.IpAddress; value: OctetString }
    | { type: typeof ValueType.Counter32; value: number }
    | { type: typeof ValueType.Gauge32; value: number }
    | { type: typeof ValueType.TimeTicks; value: number }
    | { type: typeof ValueType.Opaque; value: OctetString }
    | { type: typeof ValueType.Counter64; value: bigint }
    | { type: typeof ValueType.NoSuchObject }
    | { type: typeof ValueType.NoSuchInstance }
    | { type: typeof ValueType.EndOfMibView }

export function isExceptionValue (value: Value): boolean {
    return value.type == ValueType.NoSuchObject
        || value.type == ValueType.NoSuchInstance
        || value.type == ValueType.EndOfMibView;
}

// Type and reserved fields included
export function valueByteSize (value: Value): number {
    switch (value.type) {
        case ValueType.Integer:
        case ValueType.Counter32:
        case ValueType.Gauge32:
        case ValueType.TimeTicks:
            return 4 + 4;
        case ValueType.Counter64:
            return 4 + 8;
        case ValueType.OctetString:
        case ValueType.IpAddress:
        case ValueType.Opaque:
        case ValueType.ObjectIdentifier:
            return 4 + value.value.byteSize ();
        case ValueType.Null:
        case ValueType.NoSuchObject:
        case ValueType.NoSuchInstance:
        case ValueType.EndOfMibView:
            return 4;
    }
}

function writeValueData (buffer: SmartBuffer, value: Value, byteOrder: ByteOrder): void {
    switch (value.type) {
        case ValueType.Integer:
        case ValueType.TimeTicks:
            writeInt32 (buffer, value.value, byteOrder);
            break;
        case ValueType.Counter32:
        case ValueType.Gauge32:
            writeUInt32 (buffer, value.value, byteOrder);
            break;
        case ValueType.Counter64:
            writeUInt64 (buffer, value.value, byteOrder);
            break;
        case ValueType.OctetString:
        case ValueType.IpAddress:
        case ValueType.Opaque:
        case ValueType.ObjectIdentifier:
            value.value.writeTo (buffer, byteOrder);
            break;
        case ValueType.Null:
        case ValueType.NoSuchObject:
        case ValueType.NoSuchInstance:
        case ValueType.EndOfMibView:
            break;
    }
}

function readValueData (reader: SmartBuffer, type: number, byteOrder: ByteOrder): Value {
    switch (type) {
        case ValueType.Integer:
            return { type: ValueType.Integer, value: readInt32 (reader, byteOrder) };
        case ValueType.OctetString:
            return { type: ValueType.OctetString, value: OctetString.readFrom (reader, byteOrder) };
        case ValueType.Null:
            return { type: ValueType.Null };
        case ValueType.ObjectIdentifier:
            return { type: ValueType.ObjectIdentifier, value: ObjectIdentifier.readFrom (reader, byteOrder) };
        case ValueType.IpAddress:
            return { type: ValueType.IpAddress, value: OctetString.readFrom (reader, byteOrder) };
        case ValueType.Counter32:
            return { type: ValueType.Counter32, value: readUInt32 (reader, byteOrder) };
        case ValueType.Gauge32:
            return { type: ValueType.Gauge32, value: readUInt32 (reader, byteOrder) };
        case ValueType.TimeTicks:
            return { type: ValueType.TimeTicks, value: readInt32 (reader, byteOrder) };
        case ValueType.Opaque:
            return { type: ValueType.Opaque, value: OctetString.readFrom (reader, byteOrder) };
        case ValueType.Counter64:
            return { type: ValueType.Counter64, value: readUInt64 (reader, byteOrder) };
        case ValueType.NoSuchObject:
            return { type: ValueType.NoSuchObject };
        case ValueType.NoSuchInstance:
            return { type: ValueType.NoSuchInstance };
        case ValueType.EndOfMibView:
            return { type: ValueType.EndOfMibView };
    }
    // The payload length of an unknown type cannot be inferred, so it cannot be skipped
    throw new InvalidDataError ("Unknown type '" + type + "' in varbind",
            InvalidDataCode.EUnknownValueType);
}

/*****************************************************************************
 ** VarBind and VarBindList
 **/

export class VarBind
{
    readonly name: ObjectIdentifier;
    readonly data: Value;

    constructor (name: ObjectIdentifier, data: Value) {
        this.name = name;
        this.data = data;
    }

    byteSize (): number {
        return this.name.byteSize () + valueByteSize (this.data);
    }

    writeTo (buffer: SmartBuffer, byteOrder: ByteOrder): void {
        writeUInt16 (buffer, this.data.type, byteOrder);
        writeUInt16 (buffer, 0, byteOrder);  // reserved
        this.name.writeTo (buffer, byteOrder);
        writeValueData (buffer, this.data, byteOrder);
    }

    toBuffer (byteOrder: ByteOrder): Buffer {
        const buffer = new SmartBuffer ();
        this.writeTo (buffer, byteOrder);
        return buffer.toBuffer ();
    }

    static readFrom (reader: SmartBuffer, byteOrder: ByteOrder): VarBind {
        const vtype = readUInt16 (reader, byteOrder);
        readUInt16 (reader, byteOrder);  // reserved
        const name = ObjectIdentifier.readFrom (reader, byteOrder);
        return new VarBind (name, readValueData (reader, vtype, byteOrder));
    }

    static fromBuffer (buffer: Buffer, byteOrder: ByteOrder): VarBind {
        return VarBind.readFrom (SmartBuffer.fromBuffer (buffer), byteOrder);
    }
}

export class VarBindList
    implements Iterable<VarBind>
{
    readonly varbinds: ReadonlyArray<VarBind>;

    constructor (varbinds: ReadonlyArray<VarBind> = []) {
        this.varbinds = varbinds;
    }

    get length (): number {
        return this.varbinds.length;
    }

    isEmpty (): boolean {
        return this.varbinds.length == 0;
    }

    [Symbol.iterator] (): Iterator<VarBind> {
        return this.varbinds[Symbol.iterator] ();
    }

    byteSize (): number {
        return this.varbinds.reduce ((size, varbind) => size + varbind.byteSize (), 0);
    }

    writeTo (buffer: SmartBuffer, byteOrder: ByteOrder): void {
        for (const varbind of this.varbinds) {
            varbind.writeTo (buffer, byteOrder);
        }
    }

    toBuffer (byteOrder: ByteOrder): Buffer {
        const buffer = new SmartBuffer ();
        this.writeTo (buffer, byteOrder);
        return buffer.toBuffer ();
    }

    static readFrom (reader: SmartBuffer, byteOrder: ByteOrder, length = reader.remaining ()): VarBindList {
        const slice = readSlice (reader, length);
        const varbindList: Array<VarBind> = [];
        let bytesLeft = length;
        while ( bytesLeft > 0 ) {
            const varbind = VarBind.readFrom (slice, byteOrder);
            bytesLeft -= varbind.byteSize ();
            varbindList.push (varbind);
        }
        return new VarBindList (varbindList);
    }

    static fromBuffer (buffer: Buffer, byteOrder: ByteOrder): VarBindList {
        return VarBindList.readFrom (SmartBuffer.fromBuffer (buffer), byteOrder);
    }
}
