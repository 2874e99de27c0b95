// Copyright 2013 Stephen Vickers <stephen.vickers.sv@gmail.com>

import { SmartBuffer } from "smart-buffer";
import { readUInt32, readUInt8, writeUInt32, writeUInt8 } from "./byte-order.js";
import {
    AGENTX_VERSION,
    AgentXFlag,
    AgentXPduType,
    ByteOrder,
    decodeCode
} from "./constants.js";
import { InvalidDataCode, InvalidDataError } from "./errors.js";

export const HEADER_SIZE = 20;

export type HeaderOptions = {
    version?: number;
    flags?: number;
    sessionID?: number;
    transactionID?: number;
    packetID?: number;
}

export type PduHeaderFields = HeaderOptions & {
    pduType: AgentXPduType;
    payloadLength?: number;
}

export function byteOrderFromFlags (flags: number): ByteOrder {
    return ( flags & AgentXFlag.NetworkByteOrder )
            ? ByteOrder.BigEndian
            : ByteOrder.LittleEndian;
}

export class PduHeader
{
    readonly version: number;
    readonly pduType: AgentXPduType;
    readonly flags: number;
    readonly sessionID: number;
    readonly transactionID: number;
    readonly packetID: number;
    readonly payloadLength: number;

    constructor (fields: PduHeaderFields) {
        this.version = fields.version ?? AGENTX_VERSION;
        this.pduType = fields.pduType;
        this.flags = fields.flags ?? 0;
        this.sessionID = fields.sessionID ?? 0;
        this.transactionID = fields.transactionID ?? 0;
        this.packetID = fields.packetID ?? 0;
        this.payloadLength = fields.payloadLength ?? 0;
    }

    // Selects the order of every multi-byte field in this packet
    get byteOrder (): ByteOrder {
        return byteOrderFromFlags (this.flags);
    }

    hasFlag (flag: AgentXFlag): boolean {
        return (this.flags & flag) == flag;
    }

    fields (): Required<PduHeaderFields> {
        return {
            version: this.version,
            pduType: this.pduType,
            flags: this.flags,
            sessionID: this.sessionID,
            transactionID: this.transactionID,
            packetID: this.packetID,
            payloadLength: this.payloadLength
        };
    }

    withFlags (flags: number): PduHeader {
        return new PduHeader ({ ...this.fields (), flags: flags });
    }

    withPayloadLength (payloadLength: number): PduHeader {
        return new PduHeader ({ ...this.fields (), payloadLength: payloadLength });
    }

    writeTo (buffer: SmartBuffer): void {
        const byteOrder = this.byteOrder;
        writeUInt8 (buffer, this.version);
        writeUInt8 (buffer, this.pduType);
        writeUInt8 (buffer, this.flags);
        writeUInt8 (buffer, 0);  // reserved byte
        writeUInt32 (buffer, this.sessionID, byteOrder);
        writeUInt32 (buffer, this.transactionID, byteOrder);
        writeUInt32 (buffer, this.packetID, byteOrder);
        writeUInt32 (buffer, this.payloadLength, byteOrder);
    }

    toBuffer (): Buffer {
        const buffer = new SmartBuffer ();
        this.writeTo (buffer);
        return buffer.toBuffer ();
    }

    static readFrom (reader: SmartBuffer): PduHeader {
        // Single-byte fields come first, before the byte order is known
        const version = readUInt8 (reader);
        const pduType = decodeCode (AgentXPduType, readUInt8 (reader),
                InvalidDataCode.EUnknownPduType, "PDU type");
        const flags = readUInt8 (reader);
        readUInt8 (reader);  // reserved byte

        const byteOrder = byteOrderFromFlags (flags);
        const sessionID = readUInt32 (reader, byteOrder);
        const transactionID = readUInt32 (reader, byteOrder);
        const packetID = readUInt32 (reader, byteOrder);
        const payloadLength = readUInt32 (reader, byteOrder);

        if ( payloadLength % 4 != 0 ) {
            throw new InvalidDataError ("Payload length " + payloadLength
                    + " is not a multiple of 4", InvalidDataCode.EPayloadLength);
        }

        return new PduHeader ({
            version: version,
            pduType: pduType,
            flags: flags,
            sessionID: sessionID,
            transactionID: transactionID,
            packetID: packetID,
            payloadLength: payloadLength
        });
    }

    static fromBuffer (buffer: Buffer): PduHeader {
        return PduHeader.readFrom (SmartBuffer.fromBuffer (buffer));
    }
}
