/**
 * Tests for SamControl: handshake, key generation, lookups and lifecycle
 */

import { describe, it, expect } from 'vitest';
import { SamControl } from '../control/sam.js';
import { createKeys } from '../keys/keys.js';
import { HELLO_NOVERSION } from '../wire/commands.js';
import { SamErrorCode } from '../types/errors.js';
import { MockBridge, MockLogConfig, samHandler, TEST_PUB, TEST_PRIV } from './helpers.js';

const ADDRESS = '127.0.0.1:7656';

async function connect(bridge: MockBridge): Promise<SamControl> {
  return SamControl.connect(ADDRESS, { socketFactory: bridge });
}

describe('SamControl.connect', () => {
  it('negotiates SAM 3.0 on a new connection', async () => {
    const bridge = new MockBridge();
    const control = await connect(bridge);

    expect(control.getState()).toBe('READY');
    expect(control.endpoint).toEqual({ host: '127.0.0.1', port: 7656 });
    expect(bridge.getLines(0)).toEqual(['HELLO VERSION MIN=3.0 MAX=3.0\n']);
  });

  it('fails with ERR_VERSION_UNSUPPORTED on NOVERSION', async () => {
    const bridge = new MockBridge(samHandler({ hello: HELLO_NOVERSION }));

    await expect(connect(bridge)).rejects.toMatchObject({ code: SamErrorCode.ERR_VERSION_UNSUPPORTED });
    expect(bridge.sockets[0].destroyed).toBe(true);
  });

  it('fails with ERR_PROTOCOL carrying any other reply', async () => {
    const reply = 'HELLO REPLY RESULT=I2P_ERROR MESSAGE=busy\n';
    const bridge = new MockBridge(samHandler({ hello: reply }));

    await expect(connect(bridge)).rejects.toMatchObject({
      code: SamErrorCode.ERR_PROTOCOL,
      message: 'Unexpected HELLO reply: HELLO REPLY RESULT=I2P_ERROR MESSAGE=busy',
      detail: reply,
    });
    expect(bridge.sockets[0].destroyed).toBe(true);
  });

  it('rejects malformed addresses before dialing', async () => {
    const bridge = new MockBridge();

    await expect(SamControl.connect('localhost', { socketFactory: bridge })).rejects.toMatchObject({
      code: SamErrorCode.ERR_INVALID_ARGUMENT,
    });
    expect(bridge.sockets).toHaveLength(0);
  });
});

describe('SamControl.generateKeys', () => {
  it('returns the keys from DEST REPLY', async () => {
    const bridge = new MockBridge();
    const control = await connect(bridge);

    const keys = await control.generateKeys();

    expect(keys).toEqual({ address: TEST_PUB, privateKey: TEST_PRIV });
    expect(bridge.getLines(0)[1]).toBe('DEST GENERATE\n');
    expect(control.getState()).toBe('READY');
  });

  it('keeps the connection usable after a parse failure', async () => {
    const bridge = new MockBridge(samHandler({ dest: 'DEST REPLY PUB=abc FOO=bar\n' }));
    const control = await connect(bridge);

    await expect(control.generateKeys()).rejects.toMatchObject({ code: SamErrorCode.ERR_PARSE });
    expect(control.getState()).toBe('READY');
  });

  it('never logs private key material', async () => {
    const logs = new MockLogConfig();
    const bridge = new MockBridge();
    const control = await SamControl.connect(ADDRESS, { socketFactory: bridge, logCallback: logs.logCallback });

    await control.generateKeys();

    expect(logs.hasLog('Received DEST REPLY and')).toBe(true);
    expect(logs.logs.some((entry) => entry.includes(TEST_PRIV))).toBe(false);
  });
});

describe('SamControl.lookup', () => {
  it('resolves a known name', async () => {
    const bridge = new MockBridge(
      samHandler({ names: { 'test.i2p': 'NAMING REPLY RESULT=OK NAME=test.i2p VALUE=destAAAA\n' } })
    );
    const control = await connect(bridge);

    await expect(control.lookup('test.i2p')).resolves.toBe('destAAAA');
    expect(bridge.getLines(0)[1]).toBe('NAMING LOOKUP NAME=test.i2p\n');
  });

  it('reports names the bridge cannot resolve', async () => {
    const control = await connect(new MockBridge());

    await expect(control.lookup('nonexistent.i2p')).rejects.toMatchObject({
      code: SamErrorCode.ERR_NAME_NOT_RESOLVED,
      message: 'Unable to resolve nonexistent.i2p',
    });
  });

  it('falls back to the generic message when the reply explains nothing', async () => {
    const bridge = new MockBridge(samHandler({ names: { 'a.i2p': 'NAMING REPLY RESULT=OK NAME=a.i2p\n' } }));
    const control = await connect(bridge);

    await expect(control.lookup('a.i2p')).rejects.toMatchObject({
      code: SamErrorCode.ERR_NAME_NOT_RESOLVED,
      message: 'Name could not be resolved',
      detail: '',
    });
  });

  it('rejects names that would break the command line', async () => {
    const bridge = new MockBridge();
    const control = await connect(bridge);

    await expect(control.lookup('two words')).rejects.toMatchObject({ code: SamErrorCode.ERR_INVALID_ARGUMENT });
    await expect(control.lookup('')).rejects.toMatchObject({ code: SamErrorCode.ERR_INVALID_ARGUMENT });
    expect(bridge.getLines(0)).toHaveLength(1);
  });

  it('runs several requests over the same connection', async () => {
    const bridge = new MockBridge(
      samHandler({ names: { 'b.i2p': 'NAMING REPLY RESULT=OK NAME=b.i2p VALUE=destBBBB\n' } })
    );
    const control = await connect(bridge);

    await control.generateKeys();
    await expect(control.lookup('b.i2p')).resolves.toBe('destBBBB');
    await control.generateKeys();

    expect(bridge.sockets).toHaveLength(1);
    expect(bridge.getLines(0)).toEqual([
      'HELLO VERSION MIN=3.0 MAX=3.0\n',
      'DEST GENERATE\n',
      'NAMING LOOKUP NAME=b.i2p\n',
      'DEST GENERATE\n',
    ]);
  });
});

describe('SamControl lifecycle', () => {
  it('refuses a second request while a reply is outstanding', async () => {
    const control = await connect(new MockBridge());

    const first = control.generateKeys();
    expect(control.getState()).toBe('AWAITING_REPLY');
    await expect(control.lookup('a.i2p')).rejects.toMatchObject({ code: SamErrorCode.ERR_BUSY });

    await expect(first).resolves.toEqual({ address: TEST_PUB, privateKey: TEST_PRIV });
  });

  it('is consumed by session creation', async () => {
    const bridge = new MockBridge();
    const control = await connect(bridge);
    const keys = createKeys(TEST_PUB, TEST_PRIV);

    const session = await control.createStreamSession('svc', keys);

    expect(control.getState()).toBe('CONSUMED');
    expect(bridge.sockets).toHaveLength(2);
    expect(session.socket).toBe(bridge.sockets[1]);
    expect(bridge.sockets[0].destroyed).toBe(false);
    await expect(control.generateKeys()).rejects.toMatchObject({ code: SamErrorCode.ERR_CONSUMED });
    await expect(control.createStreamSession('svc2', keys)).rejects.toMatchObject({
      code: SamErrorCode.ERR_CONSUMED,
    });

    control.close();
    expect(control.getState()).toBe('CLOSED');
    expect(session.socket.destroyed).toBe(false);
    session.socket.destroy();
  });

  it('passes DATAGRAM port and RAW protocol as extras', async () => {
    const keys = createKeys(TEST_PUB, TEST_PRIV);

    const datagramBridge = new MockBridge();
    const datagram = await (await connect(datagramBridge)).createDatagramSession(
      'dg',
      keys,
      ['inbound.length=1'],
      7655
    );
    expect(datagramBridge.getLines(1)[1]).toBe(
      `SESSION CREATE STYLE=DATAGRAM ID=dg DESTINATION=${TEST_PRIV} OPTION=inbound.length=1 PORT=7655\n`
    );
    expect(datagram.style).toBe('DATAGRAM');

    const rawBridge = new MockBridge();
    const raw = await (await connect(rawBridge)).createRawSession('raw', keys);
    expect(rawBridge.getLines(1)[1]).toBe(`SESSION CREATE STYLE=RAW ID=raw DESTINATION=${TEST_PRIV} PROTOCOL=18\n`);
    expect(raw.style).toBe('RAW');
  });

  it('validates datagram ports without consuming the control object', async () => {
    const control = await connect(new MockBridge());

    await expect(control.createDatagramSession('dg', createKeys('a', 'b'), [], 70000)).rejects.toMatchObject({
      code: SamErrorCode.ERR_INVALID_ARGUMENT,
    });
    expect(control.getState()).toBe('READY');
  });

  it('closes idempotently and emits close', async () => {
    const bridge = new MockBridge();
    const control = await connect(bridge);
    const closed = new Promise<void>((resolve) => control.once('close', () => resolve()));

    control.close();
    control.close();

    await closed;
    expect(control.getState()).toBe('CLOSED');
    expect(bridge.sockets[0].destroyed).toBe(true);
    await expect(control.generateKeys()).rejects.toMatchObject({ code: SamErrorCode.ERR_CONNECTION_CLOSED });
  });

  it('moves to CLOSED when the bridge hangs up', async () => {
    const bridge = new MockBridge();
    const control = await connect(bridge);

    bridge.sockets[0].hangUp();

    await expect(control.generateKeys()).rejects.toMatchObject({ code: SamErrorCode.ERR_CONNECTION_CLOSED });
    expect(control.getState()).toBe('CLOSED');
  });
});
