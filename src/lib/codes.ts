// Copyright 2013 Stephen Vickers <stephen.vickers.sv@gmail.com>

export type Values<T> = T[keyof T]

export type Code<T> = Values<T> & number

type CodeTable = Readonly<Record<string, number>>

export function isCode<T extends CodeTable> (table: T, code: number): code is Code<T> {
    return Object.values (table).includes (code);
}

// Reverse lookup for log lines; decoding never falls back to this
export function codeName (table: CodeTable, code: number): string {
    for (const [name, value] of Object.entries (table)) {
        if (value == code)
            return name;
    }
    return String (code);
}
