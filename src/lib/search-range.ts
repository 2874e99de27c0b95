// Copyright 2013 Stephen Vickers <stephen.vickers.sv@gmail.com>

import { SmartBuffer } from "smart-buffer";
import { readSlice } from "./byte-order.js";
import type { ByteOrder } from "./constants.js";
import { ObjectIdentifier } from "./oid.js";

export class SearchRange
{
    readonly start: ObjectIdentifier;
    readonly end: ObjectIdentifier;

    constructor (start: ObjectIdentifier, end: ObjectIdentifier) {
        this.start = start;
        this.end = end;
    }

    // An empty end identifier means the range is unbounded
    static create (start: string, end = "", include = false): SearchRange {
        return new SearchRange (ObjectIdentifier.parse (start, include), ObjectIdentifier.parse (end));
    }

    byteSize (): number {
        return this.start.byteSize () + this.end.byteSize ();
    }

    writeTo (buffer: SmartBuffer, byteOrder: ByteOrder): void {
        this.start.writeTo (buffer, byteOrder);
        this.end.writeTo (buffer, byteOrder);
    }

    toBuffer (byteOrder: ByteOrder): Buffer {
        const buffer = new SmartBuffer ();
        this.writeTo (buffer, byteOrder);
        return buffer.toBuffer ();
    }

    static readFrom (reader: SmartBuffer, byteOrder: ByteOrder): SearchRange {
        const start = ObjectIdentifier.readFrom (reader, byteOrder);
        const end = ObjectIdentifier.readFrom (reader, byteOrder);
        return new SearchRange (start, end);
    }

    static fromBuffer (buffer: Buffer, byteOrder: ByteOrder): SearchRange {
        return SearchRange.readFrom (SmartBuffer.fromBuffer (buffer), byteOrder);
    }
}

export class SearchRangeList
    implements Iterable<SearchRange>
{
    readonly ranges: ReadonlyArray<SearchRange>;

    constructor (ranges: ReadonlyArray<SearchRange> = []) {
        this.ranges = ranges;
    }

    get length (): number {
        return this.ranges.length;
    }

    isEmpty (): boolean {
        return this.ranges.length == 0;
    }

    [Symbol.iterator] (): Iterator<SearchRange> {
        return this.ranges[Symbol.iterator] ();
    }

    byteSize (): number {
        return this.ranges.reduce ((size, range) => size + range.byteSize (), 0);
    }

    writeTo (buffer: SmartBuffer, byteOrder: ByteOrder): void {
        for (const range of this.ranges) {
            range.writeTo (buffer, byteOrder);
        }
    }

    toBuffer (byteOrder: ByteOrder): Buffer {
        const buffer = new SmartBuffer ();
        this.writeTo (buffer, byteOrder);
        return buffer.toBuffer ();
    }

    // The list has no count field: it runs to the end of `length` bytes
    static readFrom (reader: SmartBuffer, byteOrder: ByteOrder, length = reader.remaining ()): SearchRangeList {
        const slice = readSlice (reader, length);
        const searchRangeList: Array<SearchRange> = [];
        let bytesLeft = length;
        while ( bytesLeft > 0 ) {
            const range = SearchRange.readFrom (slice, byteOrder);
            bytesLeft -= range.byteSize ();
            searchRangeList.push (range);
        }
        return new SearchRangeList (searchRangeList);
    }

    static fromBuffer (buffer: Buffer, byteOrder: ByteOrder): SearchRangeList {
        return SearchRangeList.readFrom (SmartBuffer.fromBuffer (buffer), byteOrder);
    }
}
