// Copyright 2013 Stephen Vickers <stephen.vickers.sv@gmail.com>

import { isCode, type Code, type Values } from "./codes.js";
import { InvalidDataError, type InvalidDataCode } from "./errors.js";

/*****************************************************************************
 ** Constants
 **/

export const AGENTX_VERSION = 1;

export const ByteOrder = {
    LittleEndian: "LittleEndian",
    BigEndian: "BigEndian"
} as const;

export type ByteOrder = Values<typeof ByteOrder>

export const AgentXPduType = {
    Open: 1,
    Close: 2,
    Register: 3,
    Unregister: 4,
    Get: 5,
    GetNext: 6,
    GetBulk: 7,
    TestSet: 8,
    CommitSet: 9,
    UndoSet: 10,
    CleanupSet: 11,
    Notify: 12,
    Ping: 13,
    IndexAllocate: 14,
    IndexDeallocate: 15,
    AddAgentCaps: 16,
    RemoveAgentCaps: 17,
    Response: 18
} as const;

export type AgentXPduType = Code<typeof AgentXPduType>

// h.flags bits
export const AgentXFlag = {
    InstanceRegistration: 0x01,
    NewIndex: 0x02,
    AnyIndex: 0x04,
    NonDefaultContext: 0x08,
    NetworkByteOrder: 0x10
} as const;

export type AgentXFlag = Code<typeof AgentXFlag>

export const CloseReason = {
    Other: 1,
    ParseError: 2,
    ProtocolError: 3,
    Timeouts: 4,
    Shutdown: 5,
    ByManager: 6
} as const;

export type CloseReason = Code<typeof CloseReason>

// Starts at 256 so the SNMPv2 error-status values (0-18) can share res.error
export const ResponseError = {
    NoAgentXError: 0,
    OpenFailed: 256,
    NotOpen: 257,
    IndexWrongType: 258,
    IndexAlreadyAllocated: 259,
    IndexNoneAvailable: 260,
    IndexNotAllocated: 261,
    UnsupportedContext: 262,
    DuplicateRegistration: 263,
    UnknownRegistration: 264,
    UnknownAgentCaps: 265,
    ParseError: 266,
    RequestDenied: 267,
    ProcessingError: 268
} as const;

export type ResponseError = Code<typeof ResponseError>

export const ValueType = {
    Integer: 2,
    OctetString: 4,
    Null: 5,
    ObjectIdentifier: 6,
    IpAddress: 64,
    Counter32: 65,
    Gauge32: 66,
    TimeTicks: 67,
    Opaque: 68,
    Counter64: 70,
    NoSuchObject: 128,
    NoSuchInstance: 129,
    EndOfMibView: 130
} as const;

export type ValueType = Code<typeof ValueType>

export function decodeCode<T extends Readonly<Record<string, number>>> (
    table: T,
    code: number,
    errorCode: InvalidDataCode,
    label: string
): Code<T> {
    if ( ! isCode (table, code) ) {
        throw new InvalidDataError ("Unknown " + label + " '" + code + "'", errorCode);
    }
    return code;
}
