// Copyright 2013 Stephen Vickers <stephen.vickers.sv@gmail.com>

import { codeName, type Code } from "./codes.js";

export const InvalidDataCode = {
    ETruncated: 1,
    EOutOfRange: 2,
    EInvalidText: 3,
    EUnknownValueType: 4,
    EUnknownPduType: 5,
    EUnknownCloseReason: 6,
    EUnknownResponseError: 7,
    EInvalidObjectIdentifier: 8,
    EPayloadLength: 9
} as const;

export type InvalidDataCode = Code<typeof InvalidDataCode>

export function invalidDataCodeName (code: InvalidDataCode): string {
    return codeName (InvalidDataCode, code);
}

/*****************************************************************************
 ** Exception class definitions
 **/

export class InvalidDataError
    extends Error
{
    readonly code: InvalidDataCode;

    constructor (message: string, code: InvalidDataCode) {
        super(message)
        this.name = "InvalidDataError";
        this.code = code;
    }
}
