// Copyright 2013 Stephen Vickers <stephen.vickers.sv@gmail.com>

import { SmartBuffer } from "smart-buffer";
import { ensureReadable, readUInt32, readUInt8, writeUInt32, writeUInt8 } from "./byte-order.js";
import type { ByteOrder } from "./constants.js";
import { InvalidDataCode, InvalidDataError } from "./errors.js";

const INTERNET_PREFIX = [1, 3, 6, 1];
const MAX_SUB_IDS = 255;
const MAX_SUB_ID = 4294967295;

function checkSubIdCount (count: number): void {
    if ( count > MAX_SUB_IDS ) {
        throw new InvalidDataError ("Object identifier has " + count
                + " sub-identifiers, at most " + MAX_SUB_IDS + " fit the n_subid field",
                InvalidDataCode.EOutOfRange);
    }
}

/**
 * AgentX object identifier (RFC 2741 section 5.1).
 *
 * Equality, ordering and `key ()` only look at the sub-identifiers; the
 * `include` flag is a search range marker and does not take part.
 */
export class ObjectIdentifier
{
    readonly subIds: ReadonlyArray<number>;
    readonly include: boolean;

    // n_subid as read off the wire, so byteSize () reports what was consumed
    // even when a compact prefix expanded the list
    private readonly encodedSubIdCount: number;

    private constructor (subIds: ReadonlyArray<number>, include: boolean, encodedSubIdCount: number) {
        this.subIds = subIds;
        this.include = include;
        this.encodedSubIdCount = encodedSubIdCount;
    }

    static parse (text: string, include = false): ObjectIdentifier {
        if ( text == "" )
            return new ObjectIdentifier ([], include, 0);

        const subIds = text.split (".").map (function (part) {
            if ( ! /^[0-9]+$/.test (part) ) {
                throw new InvalidDataError ("Invalid sub-identifier '" + part
                        + "' in object identifier '" + text + "'",
                        InvalidDataCode.EInvalidObjectIdentifier);
            }
            const subId = Number (part);
            if ( subId > MAX_SUB_ID ) {
                throw new InvalidDataError ("Sub-identifier '" + part + "' in object identifier '"
                        + text + "' does not fit 32 bits", InvalidDataCode.EInvalidObjectIdentifier);
            }
            return subId;
        });

        return ObjectIdentifier.fromSubIds (subIds, include);
    }

    static fromSubIds (subIds: ReadonlyArray<number>, include = false): ObjectIdentifier {
        checkSubIdCount (subIds.length);
        for (const subId of subIds) {
            if ( ! Number.isInteger (subId) || subId < 0 || subId > MAX_SUB_ID ) {
                throw new InvalidDataError ("Sub-identifier " + subId
                        + " is outside the unsigned 32-bit range", InvalidDataCode.EOutOfRange);
            }
        }
        return new ObjectIdentifier ([...subIds], include, subIds.length);
    }

    isNull (): boolean {
        return this.subIds.length == 0;
    }

    withInclude (include: boolean): ObjectIdentifier {
        return new ObjectIdentifier (this.subIds, include, this.encodedSubIdCount);
    }

    equals (other: ObjectIdentifier): boolean {
        return this.compare (other) == 0;
    }

    compare (other: ObjectIdentifier): number {
        const length = Math.min (this.subIds.length, other.subIds.length);
        for (let i = 0; i < length; i++) {
            if ( this.subIds[i] != other.subIds[i] )
                return this.subIds[i] < other.subIds[i] ? -1 : 1;
        }
        return Math.sign (this.subIds.length - other.subIds.length);
    }

    key (): string {
        return this.toString ();
    }

    toString (): string {
        return this.subIds.join (".");
    }

    byteSize (): number {
        return 4 + 4 * this.encodedSubIdCount;
    }

    // The prefix field is always written as 0 with the full sub-identifier list
    writeTo (buffer: SmartBuffer, byteOrder: ByteOrder): void {
        checkSubIdCount (this.subIds.length);
        writeUInt8 (buffer, this.subIds.length);
        writeUInt8 (buffer, 0);  // prefix
        writeUInt8 (buffer, this.include ? 1 : 0);
        writeUInt8 (buffer, 0);  // reserved
        for (const subId of this.subIds) {
            writeUInt32 (buffer, subId, byteOrder);
        }
    }

    toBuffer (byteOrder: ByteOrder): Buffer {
        const buffer = new SmartBuffer ();
        this.writeTo (buffer, byteOrder);
        return buffer.toBuffer ();
    }

    static readFrom (reader: SmartBuffer, byteOrder: ByteOrder): ObjectIdentifier {
        const subIdLength = readUInt8 (reader);
        const prefix = readUInt8 (reader);
        const include = readUInt8 (reader);
        readUInt8 (reader);  // reserved

        ensureReadable (reader, subIdLength * 4);
        const subIds = prefix == 0 ? [] : [...INTERNET_PREFIX, prefix];
        for (let i = 0; i < subIdLength; i++) {
            subIds.push (readUInt32 (reader, byteOrder));
        }

        return new ObjectIdentifier (subIds, include != 0, subIdLength);
    }

    static fromBuffer (buffer: Buffer, byteOrder: ByteOrder): ObjectIdentifier {
        return ObjectIdentifier.readFrom (SmartBuffer.fromBuffer (buffer), byteOrder);
    }
}
