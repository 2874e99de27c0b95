// Copyright 2013 Stephen Vickers <stephen.vickers.sv@gmail.com>

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  AGENTX_VERSION,
  AgentXFlag,
  ByteOrder,
  CloseReason,
  ResponseError,
  ValueType,
} from '../constants.js';
import { setDebug } from '../debug.js';
import { InvalidDataCode, InvalidDataError } from '../errors.js';
import { Context, OctetString } from '../octet-string.js';
import { ObjectIdentifier } from '../oid.js';
import {
  AddAgentCapsPdu,
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
  TestSetPdu,
  UndoSetPdu,
  UnregisterPdu,
  createPduFromBuffer,
  type Pdu,
} from '../pdu.js';
import { SearchRange, SearchRangeList } from '../search-range.js';
import { VarBind, VarBindList } from '../varbind.js';

const ids = { sessionID: 1, transactionID: 2, packetID: 3 };

const openBytes = Buffer.from([
  1, 1, 0, 0, 1, 0, 0, 0, 2, 0, 0, 0, 3, 0, 0, 0, 28, 0, 0, 0,
  0, 0, 0, 0,
  3, 0, 0, 0, 1, 0, 0, 0, 2, 0, 0, 0, 3, 0, 0, 0,
  3, 0, 0, 0, 0x72, 0x63, 0x6b, 0x00,
]);

function expectInvalid(fn: () => unknown, code: number, message?: string): void {
  try {
    fn();
    expect.unreachable();
  } catch (error) {
    expect(error).toBeInstanceOf(InvalidDataError);
    expect(error).toMatchObject(message === undefined ? { code } : { code, message });
  }
}

function samplePdus(flags: number): Array<Pdu> {
  const header = { ...ids, flags };
  const context = Context.fromString('edge');
  const subtree = ObjectIdentifier.parse('1.3.6.1.4.1.8072.2');
  const ranges = [SearchRange.create('1.3.6.1.2.1.2', '1.3.6.1.2.1.3', true)];
  const varbinds = [
    new VarBind(ObjectIdentifier.parse('1.3.6.1.2.1.2.2.1.10.1'), { type: ValueType.Counter32, value: 9001 }),
    new VarBind(ObjectIdentifier.parse('1.3.6.1.2.1.2.2.1.2.1'), {
      type: ValueType.OctetString,
      value: new OctetString('eth0'),
    }),
  ];
  return [
    new OpenPdu({ ...header, timeout: 30, oid: subtree, descr: 'test subagent' }),
    new ClosePdu({ ...header, reason: CloseReason.Shutdown }),
    new RegisterPdu({ ...header, context, timeout: 10, priority: 64, rangeSubid: 9, subtree, upperBound: 12 }),
    new UnregisterPdu({ ...header, subtree }),
    new GetPdu({ ...header, context, searchRangeList: ranges }),
    new GetNextPdu({ ...header, searchRangeList: ranges }),
    new GetBulkPdu({ ...header, nonRepeaters: 1, maxRepetitions: 10, searchRangeList: ranges }),
    new TestSetPdu({ ...header, varbinds }),
    new CommitSetPdu(header),
    new UndoSetPdu(header),
    new CleanupSetPdu(header),
    new NotifyPdu({ ...header, context, varbinds }),
    new PingPdu({ ...header, context }),
    new IndexAllocatePdu({ ...header, flags: flags | AgentXFlag.AnyIndex, varbinds }),
    new IndexDeallocatePdu({ ...header, varbinds }),
    new AddAgentCapsPdu({ ...header, oid: subtree, descr: 'interfaces' }),
    new RemoveAgentCapsPdu({ ...header, context, oid: subtree }),
    new ResponsePdu({ ...header, sysUpTime: 4200, error: ResponseError.NoAgentXError, index: 0, varbinds }),
  ];
}

// Cuts the payload to `payloadLength` bytes and rewrites the header to match
function shortenedPacket(pdu: Pdu, payloadLength: number): Buffer {
  const packet = Buffer.from(pdu.toBuffer().subarray(0, 20 + payloadLength));
  if (pdu.byteOrder === ByteOrder.BigEndian) {
    packet.writeUInt32BE(payloadLength, 16);
  } else {
    packet.writeUInt32LE(payloadLength, 16);
  }
  return packet;
}

// Payload lengths short of the full one that still decode
function acceptedCuts(pdu: Pdu): Array<number> {
  const accepted: Array<number> = [];
  for (let length = 0; length < pdu.header.payloadLength; length++) {
    try {
      createPduFromBuffer(shortenedPacket(pdu, length));
      accepted.push(length);
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidDataError);
      expect(error).toMatchObject({
        code: length % 4 === 0 ? InvalidDataCode.ETruncated : InvalidDataCode.EPayloadLength,
      });
    }
  }
  return accepted;
}

afterEach(() => {
  setDebug(false);
  vi.restoreAllMocks();
});

describe('OpenPdu', () => {
  it('encodes the reference Open packet', () => {
    const pdu = new OpenPdu({ ...ids, oid: ObjectIdentifier.parse('1.2.3'), descr: 'rck' });
    expect(pdu.toBuffer()).toEqual(openBytes);
    expect(pdu.header.payloadLength).toBe(28);
  });

  it('decodes the reference Open packet', () => {
    const pdu = OpenPdu.fromBuffer(openBytes);
    expect(pdu.timeout).toBe(0);
    expect(pdu.oid.toString()).toBe('1.2.3');
    expect(pdu.descr.value).toBe('rck');
    expect(pdu.sessionID).toBe(1);
    expect(pdu.transactionID).toBe(2);
    expect(pdu.packetID).toBe(3);
    expect(pdu.context).toBeUndefined();
  });

  it('rejects a timeout that does not fit a byte', () => {
    expectInvalid(() => new OpenPdu({ timeout: 256 }).toBuffer(), InvalidDataCode.EOutOfRange);
  });
});

describe('createPduFromBuffer', () => {
  it('dispatches every PDU type in both byte orders', () => {
    for (const flags of [0, AgentXFlag.NetworkByteOrder]) {
      const pdus = samplePdus(flags);
      expect(pdus.map((pdu) => pdu.pduType)).toEqual(Array.from({ length: 18 }, (_, i) => i + 1));
      for (const pdu of pdus) {
        const bytes = pdu.toBuffer();
        expect(bytes.length).toBe(20 + pdu.header.payloadLength);
        expect(bytes.length % 4).toBe(0);
        expect(createPduFromBuffer(bytes)).toEqual(pdu);
      }
    }
  });

  it('writes multi-byte fields in the order the flags select', () => {
    const pdu = new PingPdu({ ...ids, flags: AgentXFlag.NetworkByteOrder });
    expect(pdu.byteOrder).toBe(ByteOrder.BigEndian);
    expect(pdu.toBuffer()).toEqual(Buffer.from([
      1, 13, 0x10, 0, 0, 0, 0, 1, 0, 0, 0, 2, 0, 0, 0, 3, 0, 0, 0, 0,
    ]));
  });

  it('ignores bytes after the announced payload', () => {
    const bytes = Buffer.concat([openBytes, Buffer.from([0xde, 0xad, 0xbe, 0xef])]);
    expect(createPduFromBuffer(bytes)).toEqual(OpenPdu.fromBuffer(openBytes));
  });

  it('rejects a buffer shorter than the announced payload', () => {
    expectInvalid(() => createPduFromBuffer(openBytes.subarray(0, 40)), InvalidDataCode.ETruncated,
      'Need 28 bytes but only 20 remain');
  });

  it('rejects a payload that ends inside a field', () => {
    const bytes = Buffer.from(openBytes);
    bytes[16] = 24;
    expectInvalid(() => createPduFromBuffer(bytes), InvalidDataCode.ETruncated,
      'Need 3 bytes but only 0 remain');
  });

  it('rejects every cut of a packet that keeps its announced length', () => {
    const bytes = samplePdus(AgentXFlag.NetworkByteOrder)[2].toBuffer();
    for (let length = 0; length < bytes.length; length++) {
      expectInvalid(() => createPduFromBuffer(bytes.subarray(0, length)), InvalidDataCode.ETruncated);
    }
  });

  it('rejects an unknown PDU type', () => {
    const bytes = Buffer.from(openBytes);
    bytes[1] = 0;
    expectInvalid(() => createPduFromBuffer(bytes), InvalidDataCode.EUnknownPduType, "Unknown PDU type '0'");
  });
});

describe('per-type decoding', () => {
  it('refuses a packet of another type', () => {
    expectInvalid(() => GetPdu.fromBuffer(openBytes), InvalidDataCode.EUnknownPduType,
      'Expected AgentX Get PDU but found Open');
  });

  it('decodes a Response with no varbinds', () => {
    const bytes = Buffer.from([
      1, 18, 0, 0, 1, 0, 0, 0, 2, 0, 0, 0, 3, 0, 0, 0, 8, 0, 0, 0,
      0x10, 0x27, 0, 0, 0, 0, 0, 0,
    ]);
    const pdu = ResponsePdu.fromBuffer(bytes);
    expect(pdu.sysUpTime).toBe(10000);
    expect(pdu.error).toBe(ResponseError.NoAgentXError);
    expect(pdu.index).toBe(0);
    expect(pdu.varbinds).toBeUndefined();
  });

  it('rejects an unknown response error', () => {
    const bytes = new ResponsePdu({ error: ResponseError.ParseError }).toBuffer();
    bytes[24] = 5;
    bytes[25] = 0;
    expectInvalid(() => createPduFromBuffer(bytes), InvalidDataCode.EUnknownResponseError,
      "Unknown response error '5'");
  });

  it('encodes and rejects close reasons', () => {
    const bytes = new ClosePdu({ reason: CloseReason.ByManager }).toBuffer();
    expect(bytes.subarray(20)).toEqual(Buffer.from([6, 0, 0, 0]));
    bytes[20] = 7;
    expectInvalid(() => ClosePdu.fromBuffer(bytes), InvalidDataCode.EUnknownCloseReason,
      "Unknown close reason '7'");
  });

  it('defaults a Close to reason Other', () => {
    expect(new ClosePdu().reason).toBe(CloseReason.Other);
  });

  it('encodes administrative PDUs as a bare header', () => {
    const bytes = new UndoSetPdu({ ...ids }).toBuffer();
    expect(bytes).toEqual(Buffer.from([1, 10, 0, 0, 1, 0, 0, 0, 2, 0, 0, 0, 3, 0, 0, 0, 0, 0, 0, 0]));
  });
});

describe('contexts', () => {
  it('sets NonDefaultContext when a context is present', () => {
    const pdu = new GetPdu({
      flags: AgentXFlag.NetworkByteOrder,
      context: Context.fromString('rck'),
      searchRangeList: [],
    });
    const bytes = pdu.toBuffer();
    expect(bytes[2]).toBe(0x18);
    expect(bytes.subarray(20)).toEqual(Buffer.from([0, 0, 0, 3, 0x72, 0x63, 0x6b, 0]));
    expect(GetPdu.fromBuffer(bytes).context?.toString()).toBe('rck');
  });

  it('clears NonDefaultContext when no context is given', () => {
    const pdu = new PingPdu({ flags: AgentXFlag.NonDefaultContext });
    expect(pdu.flags).toBe(0);
    expect(pdu.toBuffer().length).toBe(20);
  });

  it('leaves flags alone on PDUs that carry no context', () => {
    expect(new CommitSetPdu({ flags: AgentXFlag.NonDefaultContext }).flags).toBe(AgentXFlag.NonDefaultContext);
  });
});

describe('registration', () => {
  const subtree = ObjectIdentifier.parse('1.3.6.1.2.1.2.2.1.1');

  it('defaults priority to 127 and omits the upper bound', () => {
    const bytes = new RegisterPdu({ subtree }).toBuffer();
    expect(bytes.subarray(20, 24)).toEqual(Buffer.from([0, 127, 0, 0]));
    expect(bytes.length).toBe(20 + 4 + 4 + 4 * 10);
  });

  it('writes the upper bound after the subtree', () => {
    const pdu = new RegisterPdu({ flags: AgentXFlag.NetworkByteOrder, subtree, rangeSubid: 10, upperBound: 24 });
    const bytes = pdu.toBuffer();
    expect(bytes.subarray(bytes.length - 4)).toEqual(Buffer.from([0, 0, 0, 24]));
    expect(RegisterPdu.fromBuffer(bytes).upperBound).toBe(24);
  });

  it('requires an upper bound exactly when range_subid is set', () => {
    expectInvalid(() => new RegisterPdu({ subtree, rangeSubid: 10 }).toBuffer(), InvalidDataCode.EOutOfRange);
    expectInvalid(() => new UnregisterPdu({ subtree, upperBound: 24 }).toBuffer(), InvalidDataCode.EOutOfRange);
  });

  it('writes a reserved byte in place of the Unregister timeout', () => {
    const bytes = new UnregisterPdu({ subtree, priority: 1 }).toBuffer();
    expect(bytes.subarray(20, 24)).toEqual(Buffer.from([0, 1, 0, 0]));
  });
});

describe('ResponsePdu.createFor', () => {
  it('answers on the request session with its byte order', () => {
    const request = new GetPdu({
      flags: AgentXFlag.NetworkByteOrder,
      sessionID: 7,
      transactionID: 8,
      packetID: 9,
      context: Context.fromString('edge'),
      searchRangeList: [],
    });
    const response = ResponsePdu.createFor(request, { sysUpTime: 100, error: ResponseError.NotOpen });
    expect(response.flags).toBe(AgentXFlag.NetworkByteOrder);
    expect([response.sessionID, response.transactionID, response.packetID]).toEqual([7, 8, 9]);
    expect(response.toBuffer().subarray(20)).toEqual(Buffer.from([0, 0, 0, 100, 1, 1, 0, 0]));
  });
});

describe('logging', () => {
  it('logs decoded packets when debug is enabled', () => {
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    setDebug(true);
    createPduFromBuffer(openBytes);
    expect(spy).toHaveBeenCalledWith('Decoded AgentX Open PDU (session 1, transaction 2, packet 3)');
  });

  it('logs encoded packets', () => {
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    setDebug(true);
    new PingPdu().toBuffer();
    expect(spy).toHaveBeenCalledWith('Encoded AgentX Ping PDU (0 payload bytes)');
  });

  it('logs rejected packets before rethrowing', () => {
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    setDebug(true);
    expect(() => createPduFromBuffer(Buffer.alloc(4))).toThrow(InvalidDataError);
    expect(spy).toHaveBeenCalledWith("Rejected AgentX PDU: Unknown PDU type '0'");
  });

  it('stays quiet when debug is disabled', () => {
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    createPduFromBuffer(openBytes);
    expect(spy).not.toHaveBeenCalled();
  });
});

describe('payload truncation', () => {
  const varbinds = [
    new VarBind(ObjectIdentifier.parse('1.3.6.1.2.1.1.3.0'), { type: ValueType.TimeTicks, value: 500 }),
    new VarBind(ObjectIdentifier.parse('1.3.6.1.2.1.1.5.0'), {
      type: ValueType.OctetString,
      value: new OctetString('core-switch'),
    }),
  ];
  const ranges = [
    SearchRange.create('1.3.6.1.2.1.2', '1.3.6.1.2.1.3'),
    SearchRange.create('1.3.6.1.4.1'),
  ];
  const subtree = ObjectIdentifier.parse('1.3.6.1.2.1.2.2.1.1');

  it('stops a Response only between varbinds', () => {
    const pdu = new ResponsePdu({ ...ids, sysUpTime: 4200, varbinds });
    expect(acceptedCuts(pdu)).toEqual([8, 8 + varbinds[0].byteSize()]);
  });

  it('stops a Notify with a context only between varbinds', () => {
    const pdu = new NotifyPdu({
      ...ids,
      flags: AgentXFlag.NetworkByteOrder,
      context: Context.fromString('edge'),
      varbinds,
    });
    expect(acceptedCuts(pdu)).toEqual([8, 8 + varbinds[0].byteSize()]);
  });

  it('stops a GetBulk only between search ranges', () => {
    const pdu = new GetBulkPdu({ ...ids, nonRepeaters: 1, maxRepetitions: 5, searchRangeList: ranges });
    expect(acceptedCuts(pdu)).toEqual([4, 4 + ranges[0].byteSize()]);
  });

  it('never accepts a Register cut short of its upper bound', () => {
    const pdu = new RegisterPdu({
      ...ids,
      flags: AgentXFlag.NetworkByteOrder,
      context: Context.fromString('edge'),
      subtree,
      rangeSubid: 10,
      upperBound: 24,
    });
    expect(acceptedCuts(pdu)).toEqual([]);
  });

  it('never accepts a cut AddAgentCaps', () => {
    const pdu = new AddAgentCapsPdu({ ...ids, oid: subtree, descr: 'interfaces' });
    expect(acceptedCuts(pdu)).toEqual([]);
  });
});

describe('defaults', () => {
  it('uses the AgentX version unless one is given', () => {
    expect(new PingPdu().version).toBe(AGENTX_VERSION);
    expect(new PingPdu().toBuffer()[0]).toBe(1);
  });

  it('stores an empty Response list as absent', () => {
    const pdu = new ResponsePdu({ ...ids, varbinds: [] });
    expect(pdu.varbinds).toBeUndefined();
    expect(new ResponsePdu({ ...ids, varbinds: new VarBindList() }).varbinds).toBeUndefined();
    expect(createPduFromBuffer(pdu.toBuffer())).toEqual(pdu);
  });

  it('keeps an empty search range list on a Get', () => {
    const pdu = new GetPdu({ ...ids, searchRangeList: new SearchRangeList() });
    expect(GetPdu.fromBuffer(pdu.toBuffer())).toEqual(pdu);
  });
});
