// Copyright 2013 Stephen Vickers <stephen.vickers.sv@gmail.com>

import { SmartBuffer } from "smart-buffer";
import { readBytes, readUInt32, writePadding, writeUInt32 } from "./byte-order.js";
import type { ByteOrder } from "./constants.js";
import { InvalidDataCode, InvalidDataError } from "./errors.js";

const utf8Decoder = new TextDecoder ("utf-8", { fatal: true, ignoreBOM: true });

function paddingFor (length: number): number {
    return ( 4 - length % 4 ) % 4;
}

export class OctetString
{
    readonly value: string;

    constructor (value: string) {
        // Lone surrogates have no UTF-8 form and would be written as U+FFFD
        if ( utf8Decoder.decode (Buffer.from (value, "utf8")) !== value ) {
            throw new InvalidDataError ("Octet string '" + value + "' is not valid Unicode text"
                    + " and has no UTF-8 encoding", InvalidDataCode.EInvalidText);
        }
        this.value = value;
    }

    // Length of the content without the trailing padding
    get length (): number {
        return Buffer.byteLength (this.value, "utf8");
    }

    byteSize (): number {
        return 4 + this.length + paddingFor (this.length);
    }

    writeTo (buffer: SmartBuffer, byteOrder: ByteOrder): void {
        const octets = Buffer.from (this.value, "utf8");
        writeUInt32 (buffer, octets.length, byteOrder);
        buffer.writeBuffer (octets);
        writePadding (buffer, paddingFor (octets.length));
    }

    toBuffer (byteOrder: ByteOrder): Buffer {
        const buffer = new SmartBuffer ();
        this.writeTo (buffer, byteOrder);
        return buffer.toBuffer ();
    }

    toString (): string {
        return this.value;
    }

    static readFrom (reader: SmartBuffer, byteOrder: ByteOrder): OctetString {
        const octetStringLength = readUInt32 (reader, byteOrder);
        if ( octetStringLength == 0 )
            return new OctetString ("");

        const octets = readBytes (reader, octetStringLength);
        let value: string;
        try {
            value = utf8Decoder.decode (octets);
        } catch (error) {
            throw new InvalidDataError ("Octet string of length " + octetStringLength
                    + " is not valid UTF-8: " + (error instanceof Error ? error.message : String (error)),
                    InvalidDataCode.EInvalidText);
        }
        readBytes (reader, paddingFor (octetStringLength));

        return new OctetString (value);
    }

    static fromBuffer (buffer: Buffer, byteOrder: ByteOrder): OctetString {
        return OctetString.readFrom (SmartBuffer.fromBuffer (buffer), byteOrder);
    }
}

/**
 * Non-default context name. Only carried by a PDU whose header has the
 * NonDefaultContext flag set; encodes exactly like its octet string.
 */
export class Context
{
    readonly name: OctetString;

    constructor (name: OctetString) {
        this.name = name;
    }

    static fromString (name: string): Context {
        return new Context (new OctetString (name));
    }

    byteSize (): number {
        return this.name.byteSize ();
    }

    writeTo (buffer: SmartBuffer, byteOrder: ByteOrder): void {
        this.name.writeTo (buffer, byteOrder);
    }

    toBuffer (byteOrder: ByteOrder): Buffer {
        return this.name.toBuffer (byteOrder);
    }

    toString (): string {
        return this.name.toString ();
    }

    static readFrom (reader: SmartBuffer, byteOrder: ByteOrder): Context {
        return new Context (OctetString.readFrom (reader, byteOrder));
    }

    static fromBuffer (buffer: Buffer, byteOrder: ByteOrder): Context {
        return new Context (OctetString.fromBuffer (buffer, byteOrder));
    }
}
