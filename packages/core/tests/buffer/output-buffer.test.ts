import { describe, it, expect, vi } from 'vitest';
import { OutputBuffer } from '../../src/buffer/OutputBuffer.js';
import { CliStatus } from '../../src/cli/status.js';
import { bytesToString } from '../../src/utils/text.js';

function recorder() {
  const sent: string[] = [];
  const buffers: Uint8Array[] = [];
  const transmit = vi.fn((buffer: Uint8Array, length: number) => {
    buffers.push(buffer);
    sent.push(bytesToString(buffer, 0, length));
    return 0;
  });
  return { sent, buffers, transmit };
}

describe('OutputBuffer', () => {
  it('always leaves one byte free', () => {
    const out = new OutputBuffer(8);
    expect(out.putString('1234567')).toBe(true);
    expect(out.putByte(0x38)).toBe(false);
    expect(out.freeSpace()).toBe(1);
    expect(out.bytesStored).toBe(7);
  });

  it('puts are all-or-nothing', () => {
    const out = new OutputBuffer(8);
    out.putString('abcd');
    expect(out.putBytes(Uint8Array.of(1, 2, 3, 4))).toBe(false);
    expect(out.putBytes(Uint8Array.of(1, 2, 3, 4), 1, 4)).toBe(true);
    expect(out.bytesStored).toBe(7);
  });

  it('stores the low byte of each char', () => {
    const out = new OutputBuffer(8);
    const { sent, transmit } = recorder();
    out.putString('Ł');
    out.flush(transmit);
    expect(sent).toEqual(['\x41']);
  });

  it('flushing an empty buffer does not transmit', () => {
    const out = new OutputBuffer(16);
    const { transmit } = recorder();
    expect(out.flush(transmit)).toBe(CliStatus.SUCCESS);
    expect(transmit).not.toHaveBeenCalled();
  });

  it('alternates buffers and refuses a second flush in flight', () => {
    const out = new OutputBuffer(16);
    const { sent, buffers, transmit } = recorder();

    out.putString('ping');
    expect(out.flush(transmit)).toBe(CliStatus.SUCCESS);
    expect(out.bytesStored).toBe(0);
    expect(out.transmitComplete).toBe(false);

    out.putString('pong');
    expect(out.flush(transmit)).toBe(CliStatus.TRANSMISSION_IN_PROGRESS);
    expect(out.bytesStored).toBe(4);

    out.markTransmitComplete();
    expect(out.flush(transmit)).toBe(CliStatus.SUCCESS);
    expect(sent).toEqual(['ping', 'pong']);
    expect(buffers[0]).not.toBe(buffers[1]);
  });

  it('keeps the bytes when transmit fails', () => {
    const out = new OutputBuffer(16);
    out.putString('data');
    expect(out.flush(() => 1)).toBe(CliStatus.COMM_ERROR);
    expect(out.transmitComplete).toBe(true);
    expect(out.bytesStored).toBe(4);

    const { sent, transmit } = recorder();
    expect(out.flush(transmit)).toBe(CliStatus.SUCCESS);
    expect(sent).toEqual(['data']);
  });
});
