// Copyright 2013 Stephen Vickers <stephen.vickers.sv@gmail.com>

/*****************************************************************************
 ** Exports
 **/

export {
    AGENTX_VERSION,
    AgentXFlag,
    AgentXPduType,
    ByteOrder,
    CloseReason,
    ResponseError,
    ValueType
} from "./lib/constants.js";
export { codeName, isCode } from "./lib/codes.js";
export type { Code } from "./lib/codes.js";
export { InvalidDataCode, InvalidDataError, invalidDataCodeName } from "./lib/errors.js";
export { isDebugEnabled, setDebug } from "./lib/debug.js";

export {
    bytesToInt32,
    bytesToUint16,
    bytesToUint32,
    bytesToUint64,
    int32ToBytes,
    uint16ToBytes,
    uint32ToBytes,
    uint64ToBytes
} from "./lib/byte-order.js";

export { ObjectIdentifier } from "./lib/oid.js";
export { Context, OctetString } from "./lib/octet-string.js";
export { SearchRange, SearchRangeList } from "./lib/search-range.js";
export { VarBind, VarBindList, isExceptionValue, valueByteSize } from "./lib/varbind.js";
export type { Value } from "./lib/varbind.js";
export { HEADER_SIZE, PduHeader, byteOrderFromFlags } from "./lib/header.js";
export type { HeaderOptions, PduHeaderFields } from "./lib/header.js";

export {
    AddAgentCapsPdu,
    AdministrativePdu,
    AgentXPdu,
    CleanupSetPdu,
    ClosePdu,
    CommitSetPdu,
    GetBulkPdu,
    GetNextPdu,
    GetPdu,
    IndexAllocatePdu,
    IndexDeallocatePdu,
    NotifyPdu,
    OpenPdu,
    PingPdu,
    RegisterPdu,
    RemoveAgentCapsPdu,
    ResponsePdu,
    SearchRangePdu,
    TestSetPdu,
    UndoSetPdu,
    UnregisterPdu,
    VarBindPdu,
    createPduFromBuffer
} from "./lib/pdu.js";
export type {
    AddAgentCapsPduOptions,
    ClosePduOptions,
    Frame,
    GetBulkPduOptions,
    OpenPduOptions,
    Pdu,
    PduOptions,
    RegisterPduOptions,
    RemoveAgentCapsPduOptions,
    ResponseBody,
    ResponsePduOptions,
    SearchRangePduOptions,
    UnregisterPduOptions,
    VarBindPduOptions
} from "./lib/pdu.js";
