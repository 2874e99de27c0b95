// Copyright 2013 Stephen Vickers <stephen.vickers.sv@gmail.com>

import { SmartBuffer } from "smart-buffer";
import {
    readSlice,
    readUInt16,
    readUInt32,
    readUInt8,
    writeUInt16,
    writeUInt32,
    writeUInt8
} from "./byte-order.js";
import { codeName } from "./codes.js";
import {
    AGENTX_VERSION,
    AgentXFlag,
    AgentXPduType,
    CloseReason,
    ResponseError,
    decodeCode,
    type ByteOrder
} from "./constants.js";
import { debug } from "./debug.js";
import { InvalidDataCode, InvalidDataError } from "./errors.js";
import { PduHeader, byteOrderFromFlags, type HeaderOptions } from "./header.js";
import { Context, OctetString } from "./octet-string.js";
import { ObjectIdentifier } from "./oid.js";
import { SearchRange, SearchRangeList } from "./search-range.js";
import { VarBind, VarBindList } from "./varbind.js";

export type PduOptions = HeaderOptions & {
    context?: Context;
}

export type Frame = {
    header: PduHeader;
    payload: SmartBuffer;
}

const DEFAULT_PRIORITY = 127;

/*****************************************************************************
 ** Decoding helpers
 **/

function readFrame (buffer: Buffer, expected?: AgentXPduType): Frame {
    const reader = SmartBuffer.fromBuffer (buffer);
    const header = PduHeader.readFrom (reader);
    if ( expected !== undefined && header.pduType != expected ) {
        throw new InvalidDataError ("Expected AgentX " + codeName (AgentXPduType, expected)
                + " PDU but found " + codeName (AgentXPduType, header.pduType),
                InvalidDataCode.EUnknownPduType);
    }
    // Bytes past payloadLength belong to the next PDU on the stream
    return { header: header, payload: readSlice (reader, header.payloadLength) };
}

function headerOptions (header: PduHeader): HeaderOptions {
    return {
        version: header.version,
        flags: header.flags,
        sessionID: header.sessionID,
        transactionID: header.transactionID,
        packetID: header.packetID
    };
}

function readContext (frame: Frame): PduOptions {
    const options: PduOptions = headerOptions (frame.header);
    if ( frame.header.hasFlag (AgentXFlag.NonDefaultContext) )
        options.context = Context.readFrom (frame.payload, frame.header.byteOrder);
    return options;
}

function toSearchRangeList (ranges: SearchRangeList | ReadonlyArray<SearchRange>): SearchRangeList {
    return ranges instanceof SearchRangeList ? ranges : new SearchRangeList (ranges);
}

function toVarBindList (varbinds: VarBindList | ReadonlyArray<VarBind>): VarBindList {
    return varbinds instanceof VarBindList ? varbinds : new VarBindList (varbinds);
}

function toOctetString (value: OctetString | string | undefined): OctetString {
    if ( value instanceof OctetString )
        return value;
    return new OctetString (value ?? "");
}

/*****************************************************************************
 ** Base PDU
 **/

export abstract class AgentXPdu
{
    abstract readonly pduType: AgentXPduType;

    readonly version: number;
    readonly flags: number;
    readonly sessionID: number;
    readonly transactionID: number;
    readonly packetID: number;
    readonly context: Context | undefined;

    protected constructor (options: PduOptions, carriesContext: boolean) {
        let flags = options.flags ?? 0;
        let context: Context | undefined = undefined;

        // NonDefaultContext follows the presence of a context on PDUs that can carry one
        if ( carriesContext ) {
            context = options.context;
            flags = context
                    ? flags | AgentXFlag.NonDefaultContext
                    : flags & ~AgentXFlag.NonDefaultContext;
        }

        this.version = options.version ?? AGENTX_VERSION;
        this.flags = flags;
        this.sessionID = options.sessionID ?? 0;
        this.transactionID = options.transactionID ?? 0;
        this.packetID = options.packetID ?? 0;
        this.context = context;
    }

    get byteOrder (): ByteOrder {
        return byteOrderFromFlags (this.flags);
    }

    // The payload length is computed from the encoded payload every time
    get header (): PduHeader {
        return this.headerFor (this.payloadToBuffer ().length);
    }

    toBuffer (): Buffer {
        const payload = this.payloadToBuffer ();
        const header = this.headerFor (payload.length);
        debug ("Encoded AgentX " + codeName (AgentXPduType, this.pduType) + " PDU ("
                + payload.length + " payload bytes)");
        return Buffer.concat ([header.toBuffer (), payload]);
    }

    protected abstract writePayload (buffer: SmartBuffer, byteOrder: ByteOrder): void;

    private headerFor (payloadLength: number): PduHeader {
        return new PduHeader ({
            version: this.version,
            pduType: this.pduType,
            flags: this.flags,
            sessionID: this.sessionID,
            transactionID: this.transactionID,
            packetID: this.packetID,
            payloadLength: payloadLength
        });
    }

    private payloadToBuffer (): Buffer {
        const buffer = new SmartBuffer ();
        const byteOrder = this.byteOrder;
        if ( this.context )
            this.context.writeTo (buffer, byteOrder);
        this.writePayload (buffer, byteOrder);
        return buffer.toBuffer ();
    }
}

/*****************************************************************************
 ** Session PDUs
 **/

export type OpenPduOptions = PduOptions & {
    timeout?: number;
    oid?: ObjectIdentifier;
    descr?: OctetString | string;
}

export class OpenPdu
    extends AgentXPdu
{
    readonly pduType = AgentXPduType.Open;
    // seconds, 0 means use the master agent's default
    readonly timeout: number;
    readonly oid: ObjectIdentifier;
    readonly descr: OctetString;

    constructor (options: OpenPduOptions = {}) {
        super (options, true);
        this.timeout = options.timeout ?? 0;
        this.oid = options.oid ?? ObjectIdentifier.parse ("");
        this.descr = toOctetString (options.descr);
    }

    protected writePayload (buffer: SmartBuffer, byteOrder: ByteOrder): void {
        writeUInt8 (buffer, this.timeout);
        writeUInt8 (buffer, 0);  // 3 x reserved bytes
        writeUInt8 (buffer, 0);
        writeUInt8 (buffer, 0);
        this.oid.writeTo (buffer, byteOrder);
        this.descr.writeTo (buffer, byteOrder);
    }

    static readPayload (frame: Frame): OpenPdu {
        const options: OpenPduOptions = readContext (frame);
        const byteOrder = frame.header.byteOrder;
        options.timeout = readUInt8 (frame.payload);
        readUInt8 (frame.payload);
        readUInt8 (frame.payload);
        readUInt8 (frame.payload);
        options.oid = ObjectIdentifier.readFrom (frame.payload, byteOrder);
        options.descr = OctetString.readFrom (frame.payload, byteOrder);
        return new OpenPdu (options);
    }

    static fromBuffer (buffer: Buffer): OpenPdu {
        return OpenPdu.readPayload (readFrame (buffer, AgentXPduType.Open));
    }
}

export type ClosePduOptions = HeaderOptions & {
    reason?: CloseReason;
}

export class ClosePdu
    extends AgentXPdu
{
    readonly pduType = AgentXPduType.Close;
    readonly reason: CloseReason;

    constructor (options: ClosePduOptions = {}) {
        super (options, false);
        this.reason = options.reason ?? CloseReason.Other;
    }

    protected writePayload (buffer: SmartBuffer): void {
        writeUInt8 (buffer, this.reason);
        writeUInt8 (buffer, 0);  // 3 x reserved bytes
        writeUInt8 (buffer, 0);
        writeUInt8 (buffer, 0);
    }

    static readPayload (frame: Frame): ClosePdu {
        const reason = decodeCode (CloseReason, readUInt8 (frame.payload),
                InvalidDataCode.EUnknownCloseReason, "close reason");
        return new ClosePdu ({ ...headerOptions (frame.header), reason: reason });
    }

    static fromBuffer (buffer: Buffer): ClosePdu {
        return ClosePdu.readPayload (readFrame (buffer, AgentXPduType.Close));
    }
}

/*****************************************************************************
 ** Registration PDUs
 **/

type Registration = {
    priority: number;
    rangeSubid: number;
    subtree: ObjectIdentifier;
    upperBound: number | undefined;
}

function writeRegistration (
    buffer: SmartBuffer,
    byteOrder: ByteOrder,
    firstByte: number,
    registration: Registration
): void {
    if ( (registration.rangeSubid != 0) != (registration.upperBound !== undefined) ) {
        throw new InvalidDataError ("Upper bound must be given exactly when range_subid is non-zero"
                + " (range_subid " + registration.rangeSubid + ")", InvalidDataCode.EOutOfRange);
    }
    writeUInt8 (buffer, firstByte);
    writeUInt8 (buffer, registration.priority);
    writeUInt8 (buffer, registration.rangeSubid);
    writeUInt8 (buffer, 0);  // reserved
    registration.subtree.writeTo (buffer, byteOrder);
    if ( registration.upperBound !== undefined )
        writeUInt32 (buffer, registration.upperBound, byteOrder);
}

function readRegistration (frame: Frame): { firstByte: number } & Registration {
    const byteOrder = frame.header.byteOrder;
    const firstByte = readUInt8 (frame.payload);
    const priority = readUInt8 (frame.payload);
    const rangeSubid = readUInt8 (frame.payload);
    readUInt8 (frame.payload);  // reserved
    const subtree = ObjectIdentifier.readFrom (frame.payload, byteOrder);
    const upperBound = rangeSubid != 0 ? readUInt32 (frame.payload, byteOrder) : undefined;
    return {
        firstByte: firstByte,
        priority: priority,
        rangeSubid: rangeSubid,
        subtree: subtree,
        upperBound: upperBound
    };
}

export type RegisterPduOptions = PduOptions & {
    subtree: ObjectIdentifier;
    timeout?: number;
    priority?: number;
    rangeSubid?: number;
    upperBound?: number;
}

export class RegisterPdu
    extends AgentXPdu
{
    readonly pduType = AgentXPduType.Register;
    readonly timeout: number;
    readonly priority: number;
    readonly rangeSubid: number;
    readonly subtree: ObjectIdentifier;
    readonly upperBound: number | undefined;

    constructor (options: RegisterPduOptions) {
        super (options, true);
        this.timeout = options.timeout ?? 0;
        this.priority = options.priority ?? DEFAULT_PRIORITY;
        this.rangeSubid = options.rangeSubid ?? 0;
        this.subtree = options.subtree;
        this.upperBound = options.upperBound;
    }

    protected writePayload (buffer: SmartBuffer, byteOrder: ByteOrder): void {
        writeRegistration (buffer, byteOrder, this.timeout, this);
    }

    static readPayload (frame: Frame): RegisterPdu {
        const options = readContext (frame);
        const registration = readRegistration (frame);
        return new RegisterPdu ({
            ...options,
            timeout: registration.firstByte,
            priority: registration.priority,
            rangeSubid: registration.rangeSubid,
            subtree: registration.subtree,
            upperBound: registration.upperBound
        });
    }

    static fromBuffer (buffer: Buffer): RegisterPdu {
        return RegisterPdu.readPayload (readFrame (buffer, AgentXPduType.Register));
    }
}

export type UnregisterPduOptions = PduOptions & {
    subtree: ObjectIdentifier;
    priority?: number;
    rangeSubid?: number;
    upperBound?: number;
}

export class UnregisterPdu
    extends AgentXPdu
{
    readonly pduType = AgentXPduType.Unregister;
    readonly priority: number;
    readonly rangeSubid: number;
    readonly subtree: ObjectIdentifier;
    readonly upperBound: number | undefined;

    constructor (options: UnregisterPduOptions) {
        super (options, true);
        this.priority = options.priority ?? DEFAULT_PRIORITY;
        this.rangeSubid = options.rangeSubid ?? 0;
        this.subtree = options.subtree;
        this.upperBound = options.upperBound;
    }

    protected writePayload (buffer: SmartBuffer, byteOrder: ByteOrder): void {
        writeRegistration (buffer, byteOrder, 0, this);  // reserved in place of timeout
    }

    static readPayload (frame: Frame): UnregisterPdu {
        const options = readContext (frame);
        const registration = readRegistration (frame);
        return new UnregisterPdu ({
            ...options,
            priority: registration.priority,
            rangeSubid: registration.rangeSubid,
            subtree: registration.subtree,
            upperBound: registration.upperBound
        });
    }

    static fromBuffer (buffer: Buffer): UnregisterPdu {
        return UnregisterPdu.readPayload (readFrame (buffer, AgentXPduType.Unregister));
    }
}

/*****************************************************************************
 ** Get-alike PDUs
 **/

export type SearchRangePduOptions = PduOptions & {
    searchRangeList: SearchRangeList | ReadonlyArray<SearchRange>;
}

export abstract class SearchRangePdu
    extends AgentXPdu
{
    readonly searchRangeList: SearchRangeList;

    protected constructor (options: SearchRangePduOptions) {
        super (options, true);
        this.searchRangeList = toSearchRangeList (options.searchRangeList);
    }

    protected writePayload (buffer: SmartBuffer, byteOrder: ByteOrder): void {
        this.searchRangeList.writeTo (buffer, byteOrder);
    }
}

function readSearchRangePayload (frame: Frame): SearchRangePduOptions {
    const options = readContext (frame);
    return {
        ...options,
        searchRangeList: SearchRangeList.readFrom (frame.payload, frame.header.byteOrder)
    };
}

export class GetPdu
    extends SearchRangePdu
{
    readonly pduType = AgentXPduType.Get;

    constructor (options: SearchRangePduOptions) {
        super (options);
    }

    static readPayload (frame: Frame): GetPdu {
        return new GetPdu (readSearchRangePayload (frame));
    }

    static fromBuffer (buffer: Buffer): GetPdu {
        return GetPdu.readPayload (readFrame (buffer, AgentXPduType.Get));
    }
}

export class GetNextPdu
    extends SearchRangePdu
{
    readonly pduType = AgentXPduType.GetNext;

    constructor (options: SearchRangePduOptions) {
        super (options);
    }

    static readPayload (frame: Frame): GetNextPdu {
        return new GetNextPdu (readSearchRangePayload (frame));
    }

    static fromBuffer (buffer: Buffer): GetNextPdu {
        return GetNextPdu.readPayload (readFrame (buffer, AgentXPduType.GetNext));
    }
}

export type GetBulkPduOptions = SearchRangePduOptions & {
    nonRepeaters?: number;
    maxRepetitions?: number;
}

export class GetBulkPdu
    extends AgentXPdu
{
    readonly pduType = AgentXPduType.GetBulk;
    readonly nonRepeaters: number;
    readonly maxRepetitions: number;
    readonly searchRangeList: SearchRangeList;

    constructor (options: GetBulkPduOptions) {
        super (options, true);
        this.nonRepeaters = options.nonRepeaters ?? 0;
        this.maxRepetitions = options.maxRepetitions ?? 0;
        this.searchRangeList = toSearchRangeList (options.searchRangeList);
    }

    protected writePayload (buffer: SmartBuffer, byteOrder: ByteOrder): void {
        writeUInt16 (buffer, this.nonRepeaters, byteOrder);
        writeUInt16 (buffer, this.maxRepetitions, byteOrder);
        this.searchRangeList.writeTo (buffer, byteOrder);
    }

    static readPayload (frame: Frame): GetBulkPdu {
        const options = readContext (frame);
        const byteOrder = frame.header.byteOrder;
        const nonRepeaters = readUInt16 (frame.payload, byteOrder);
        const maxRepetitions = readUInt16 (frame.payload, byteOrder);
        return new GetBulkPdu ({
            ...options,
            nonRepeaters: nonRepeaters,
            maxRepetitions: maxRepetitions,
            searchRangeList: SearchRangeList.readFrom (frame.payload, byteOrder)
        });
    }

    static fromBuffer (buffer: Buffer): GetBulkPdu {
        return GetBulkPdu.readPayload (readFrame (buffer, AgentXPduType.GetBulk));
    }
}

/*****************************************************************************
 ** VarBind-alike PDUs
 **/

export type VarBindPduOptions = PduOptions & {
    varbinds: VarBindList | ReadonlyArray<VarBind>;
}

export abstract class VarBindPdu
    extends AgentXPdu
{
    readonly varbinds: VarBindList;

    protected constructor (options: VarBindPduOptions) {
        super (options, true);
        this.varbinds = toVarBindList (options.varbinds);
    }

    protected writePayload (buffer: SmartBuffer, byteOrder: ByteOrder): void {
        this.varbinds.writeTo (buffer, byteOrder);
    }
}

function readVarBindPayload (frame: Frame): VarBindPduOptions {
    const options = readContext (frame);
    return {
        ...options,
        varbinds: VarBindList.readFrom (frame.payload, frame.header.byteOrder)
    };
}

export class TestSetPdu
    extends VarBindPdu
{
    readonly pduType = AgentXPduType.TestSet;

    constructor (options: VarBindPduOptions) {
        super (options);
    }

    static readPayload (frame: Frame): TestSetPdu {
        return new TestSetPdu (readVarBindPayload (frame));
    }

    static fromBuffer (buffer: Buffer): TestSetPdu {
        return TestSetPdu.readPayload (readFrame (buffer, AgentXPduType.TestSet));
    }
}

export class NotifyPdu
    extends VarBindPdu
{
    readonly pduType = AgentXPduType.Notify;

    constructor (options: VarBindPduOptions) {
        super (options);
    }

    static readPayload (frame: Frame): NotifyPdu {
        return new NotifyPdu (readVarBindPayload (frame));
    }

    static fromBuffer (buffer: Buffer): NotifyPdu {
        return NotifyPdu.readPayload (readFrame (buffer, AgentXPduType.Notify));
    }
}

export class IndexAllocatePdu
    extends VarBindPdu
{
    readonly pduType = AgentXPduType.IndexAllocate;

    constructor (options: VarBindPduOptions) {
        super (options);
    }

    static readPayload (frame: Frame): IndexAllocatePdu {
        return new IndexAllocatePdu (readVarBindPayload (frame));
    }

    static fromBuffer (buffer: Buffer): IndexAllocatePdu {
        return IndexAllocatePdu.readPayload (readFrame (buffer, AgentXPduType.IndexAllocate));
    }
}

export class IndexDeallocatePdu
    extends VarBindPdu
{
    readonly pduType = AgentXPduType.IndexDeallocate;

    constructor (options: VarBindPduOptions) {
        super (options);
    }

    static readPayload (frame: Frame): IndexDeallocatePdu {
        return new IndexDeallocatePdu (readVarBindPayload (frame));
    }

    static fromBuffer (buffer: Buffer): IndexDeallocatePdu {
        return IndexDeallocatePdu.readPayload (readFrame (buffer, AgentXPduType.IndexDeallocate));
    }
}

/*****************************************************************************
 ** Administrative PDUs (header only)
 **/

export abstract class AdministrativePdu
    extends AgentXPdu
{
    protected constructor (options: HeaderOptions) {
        super (options, false);
    }

    protected writePayload (): void {
    }
}

export class CommitSetPdu
    extends AdministrativePdu
{
    readonly pduType = AgentXPduType.CommitSet;

    constructor (options: HeaderOptions = {}) {
        super (options);
    }

    static readPayload (frame: Frame): CommitSetPdu {
        return new CommitSetPdu (headerOptions (frame.header));
    }

    static fromBuffer (buffer: Buffer): CommitSetPdu {
        return CommitSetPdu.readPayload (readFrame (buffer, AgentXPduType.CommitSet));
    }
}

export class UndoSetPdu
    extends AdministrativePdu
{
    readonly pduType = AgentXPduType.UndoSet;

    constructor (options: HeaderOptions = {}) {
        super (options);
    }

    static readPayload (frame: Frame): UndoSetPdu {
        return new UndoSetPdu (headerOptions (frame.header));
    }

    static fromBuffer (buffer: Buffer): UndoSetPdu {
        return UndoSetPdu.readPayload (readFrame (buffer, AgentXPduType.UndoSet));
    }
}

export class CleanupSetPdu
    extends AdministrativePdu
{
    readonly pduType = AgentXPduType.CleanupSet;

    constructor (options: HeaderOptions = {}) {
        super (options);
    }

    static readPayload (frame: Frame): CleanupSetPdu {
        return new CleanupSetPdu (headerOptions (frame.header));
    }

    static fromBuffer (buffer: Buffer): CleanupSetPdu {
        return CleanupSetPdu.readPayload (readFrame (buffer, AgentXPduType.CleanupSet));
    }
}

/*****************************************************************************
 ** Ping and agent capabilities
 **/

export class PingPdu
    extends AgentXPdu
{
    readonly pduType = AgentXPduType.Ping;

    constructor (options: PduOptions = {}) {
        super (options, true);
    }

    protected writePayload (): void {
    }

    static readPayload (frame: Frame): PingPdu {
        return new PingPdu (readContext (frame));
    }

    static fromBuffer (buffer: Buffer): PingPdu {
        return PingPdu.readPayload (readFrame (buffer, AgentXPduType.Ping));
    }
}

export type AddAgentCapsPduOptions = PduOptions & {
    oid: ObjectIdentifier;
    descr?: OctetString | string;
}

export class AddAgentCapsPdu
    extends AgentXPdu
{
    readonly pduType = AgentXPduType.AddAgentCaps;
    readonly oid: ObjectIdentifier;
    readonly descr: OctetString;

    constructor (options: AddAgentCapsPduOptions) {
        super (options, true);
        this.oid = options.oid;
        this.descr = toOctetString (options.descr);
    }

    protected writePayload (buffer: SmartBuffer, byteOrder: ByteOrder): void {
        this.oid.writeTo (buffer, byteOrder);
        this.descr.writeTo (buffer, byteOrder);
    }

    static readPayload (frame: Frame): AddAgentCapsPdu {
        const options = readContext (frame);
        const byteOrder = frame.header.byteOrder;
        const oid = ObjectIdentifier.readFrom (frame.payload, byteOrder);
        const descr = OctetString.readFrom (frame.payload, byteOrder);
        return new AddAgentCapsPdu ({ ...options, oid: oid, descr: descr });
    }

    static fromBuffer (buffer: Buffer): AddAgentCapsPdu {
        return AddAgentCapsPdu.readPayload (readFrame (buffer, AgentXPduType.AddAgentCaps));
    }
}

export type RemoveAgentCapsPduOptions = PduOptions & {
    oid: ObjectIdentifier;
}

export class RemoveAgentCapsPdu
    extends AgentXPdu
{
    readonly pduType = AgentXPduType.RemoveAgentCaps;
    readonly oid: ObjectIdentifier;

    constructor (options: RemoveAgentCapsPduOptions) {
        super (options, true);
        this.oid = options.oid;
    }

    protected writePayload (buffer: SmartBuffer, byteOrder: ByteOrder): void {
        this.oid.writeTo (buffer, byteOrder);
    }

    static readPayload (frame: Frame): RemoveAgentCapsPdu {
        const options = readContext (frame);
        const oid = ObjectIdentifier.readFrom (frame.payload, frame.header.byteOrder);
        return new RemoveAgentCapsPdu ({ ...options, oid: oid });
    }

    static fromBuffer (buffer: Buffer): RemoveAgentCapsPdu {
        return RemoveAgentCapsPdu.readPayload (readFrame (buffer, AgentXPduType.RemoveAgentCaps));
    }
}

/*****************************************************************************
 ** Response
 **/

export type ResponseBody = {
    // hundredths of a second, wraps after 2^32
    sysUpTime?: number;
    error?: ResponseError;
    index?: number;
    varbinds?: VarBindList | ReadonlyArray<VarBind>;
}

export type ResponsePduOptions = HeaderOptions & ResponseBody

export class ResponsePdu
    extends AgentXPdu
{
    readonly pduType = AgentXPduType.Response;
    readonly sysUpTime: number;
    readonly error: ResponseError;
    readonly index: number;
    readonly varbinds: VarBindList | undefined;

    constructor (options: ResponsePduOptions = {}) {
        super (options, false);
        this.sysUpTime = options.sysUpTime ?? 0;
        this.error = options.error ?? ResponseError.NoAgentXError;
        this.index = options.index ?? 0;
        // An empty list and no list share one encoding; both read back as undefined
        const varbinds = options.varbinds ? toVarBindList (options.varbinds) : undefined;
        this.varbinds = varbinds && ! varbinds.isEmpty () ? varbinds : undefined;
    }

    // Answers `request` on the same session, transaction, packet and byte order
    static createFor (request: HeaderOptions, body: ResponseBody = {}): ResponsePdu {
        return new ResponsePdu ({
            ...body,
            flags: (request.flags ?? 0) & AgentXFlag.NetworkByteOrder,
            sessionID: request.sessionID,
            transactionID: request.transactionID,
            packetID: request.packetID
        });
    }

    protected writePayload (buffer: SmartBuffer, byteOrder: ByteOrder): void {
        writeUInt32 (buffer, this.sysUpTime, byteOrder);
        writeUInt16 (buffer, this.error, byteOrder);
        writeUInt16 (buffer, this.index, byteOrder);
        if ( this.varbinds )
            this.varbinds.writeTo (buffer, byteOrder);
    }

    static readPayload (frame: Frame): ResponsePdu {
        const byteOrder = frame.header.byteOrder;
        const sysUpTime = readUInt32 (frame.payload, byteOrder);
        const error = decodeCode (ResponseError, readUInt16 (frame.payload, byteOrder),
                InvalidDataCode.EUnknownResponseError, "response error");
        const index = readUInt16 (frame.payload, byteOrder);
        const varbinds = frame.payload.remaining () > 0
                ? VarBindList.readFrom (frame.payload, byteOrder)
                : undefined;
        return new ResponsePdu ({
            ...headerOptions (frame.header),
            sysUpTime: sysUpTime,
            error: error,
            index: index,
            varbinds: varbinds
        });
    }

    static fromBuffer (buffer: Buffer): ResponsePdu {
        return ResponsePdu.readPayload (readFrame (buffer, AgentXPduType.Response));
    }
}

/*****************************************************************************
 ** Dispatch
 **/

export type Pdu =
    | OpenPdu
    | ClosePdu
    | RegisterPdu
    | UnregisterPdu
    | GetPdu
    | GetNextPdu
    | GetBulkPdu
    | TestSetPdu
    | CommitSetPdu
    | UndoSetPdu
    | CleanupSetPdu
    | NotifyPdu
    | PingPdu
    | IndexAllocatePdu
    | IndexDeallocatePdu
    | AddAgentCapsPdu
    | RemoveAgentCapsPdu
    | ResponsePdu

function readPdu (frame: Frame): Pdu {
    switch ( frame.header.pduType ) {
        case AgentXPduType.Open:
            return OpenPdu.readPayload (frame);
        case AgentXPduType.Close:
            return ClosePdu.readPayload (frame);
        case AgentXPduType.Register:
            return RegisterPdu.readPayload (frame);
        case AgentXPduType.Unregister:
            return UnregisterPdu.readPayload (frame);
        case AgentXPduType.Get:
            return GetPdu.readPayload (frame);
        case AgentXPduType.GetNext:
            return GetNextPdu.readPayload (frame);
        case AgentXPduType.GetBulk:
            return GetBulkPdu.readPayload (frame);
        case AgentXPduType.TestSet:
            return TestSetPdu.readPayload (frame);
        case AgentXPduType.CommitSet:
            return CommitSetPdu.readPayload (frame);
        case AgentXPduType.UndoSet:
            return UndoSetPdu.readPayload (frame);
        case AgentXPduType.CleanupSet:
            return CleanupSetPdu.readPayload (frame);
        case AgentXPduType.Notify:
            return NotifyPdu.readPayload (frame);
        case AgentXPduType.Ping:
            return PingPdu.readPayload (frame);
        case AgentXPduType.IndexAllocate:
            return IndexAllocatePdu.readPayload (frame);
        case AgentXPduType.IndexDeallocate:
            return IndexDeallocatePdu.readPayload (frame);
        case AgentXPduType.AddAgentCaps:
            return AddAgentCapsPdu.readPayload (frame);
        case AgentXPduType.RemoveAgentCaps:
            return RemoveAgentCapsPdu.readPayload (frame);
        case AgentXPduType.Response:
            return ResponsePdu.readPayload (frame);
    }
}

/**
 * Parses one framed PDU. `buffer` must hold the 20-byte header and the
 * `payloadLength` bytes it announces; anything after that is ignored.
 */
export function createPduFromBuffer (buffer: Buffer): Pdu {
    try {
        const pdu = readPdu (readFrame (buffer));
        debug ("Decoded AgentX " + codeName (AgentXPduType, pdu.pduType) + " PDU (session "
                + pdu.sessionID + ", transaction " + pdu.transactionID + ", packet "
                + pdu.packetID + ")");
        return pdu;
    } catch (error) {
        debug ("Rejected AgentX PDU: " + (error instanceof Error ? error.message : String (error)));
        throw error;
    }
}
