// Copyright 2013 Stephen Vickers <stephen.vickers.sv@gmail.com>

let DEBUG = false;

export function setDebug (enabled: boolean): void {
    DEBUG = enabled;
}

export function isDebugEnabled (): boolean {
    return DEBUG;
}

export function debug (line: unknown): void {
    if ( DEBUG ) {
        console.debug (line);
    }
}
