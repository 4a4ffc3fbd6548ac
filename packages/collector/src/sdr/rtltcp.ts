import { Socket } from 'net';
import type { SDRConfig } from '@rfmapper/shared';
import { HardwareError } from '../errors.js';

/**
 * RTL-TCP Client: pulls fixed-size IQ blocks from an rtl_tcp server.
 *
 * Protocol:
 * - TCP connection to host:port
 * - First 12 bytes from server: magic (4) + tuner type (4) + gain count (4)
 * - After handshake: raw unsigned 8-bit IQ samples stream
 * - Commands: 5-byte packets (1 byte command + 4 byte big-endian value)
 */

// rtl_tcp command bytes
export const CMD_SET_FREQUENCY     = 0x01;
export const CMD_SET_SAMPLE_RATE   = 0x02;
export const CMD_SET_GAIN_MODE     = 0x03;  // 0=auto, 1=manual
export const CMD_SET_GAIN          = 0x04;
export const CMD_SET_FREQ_CORR     = 0x05;
export const CMD_SET_AGC_MODE      = 0x08;

const HANDSHAKE_BYTES = 12;
const CONNECT_TIMEOUT_MS = 10000;
const READ_TIMEOUT_MS = 5000;

const TUNER_TYPES: Record<number, string> = {
  1: 'E4000',
  2: 'FC0012',
  3: 'FC0013',
  4: 'FC2580',
  5: 'R820T',
  6: 'R828D',
};

export interface RtlTcpHandshake {
  tunerType: string;
  gainCount: number;
}

export interface RtlTcpClientOptions {
  /** How long readBlock waits for a full block */
  readTimeoutMs?: number;
}

/** Parse the 12-byte greeting; null if the magic is not RTL0 */
export function parseHandshake(buf: Buffer): RtlTcpHandshake | null {
  if (buf.length < HANDSHAKE_BYTES || buf.toString('ascii', 0, 4) !== 'RTL0') return null;
  const tunerTypeId = buf.readUInt32BE(4);
  return {
    tunerType: TUNER_TYPES[tunerTypeId] || `Unknown(${tunerTypeId})`,
    gainCount: buf.readUInt32BE(8),
  };
}

/** 5-byte command packet */
export function encodeCommand(cmd: number, value: number): Buffer {
  const buf = Buffer.alloc(5);
  buf[0] = cmd;
  buf.writeUInt32BE(value >>> 0, 1);
  return buf;
}

/** rtl_tcp sends uint8 samples: 0-255 -> -1.0 to +1.0, I/Q interleaved */
export function convertIQ(data: Buffer): Float32Array {
  const count = data.length - (data.length % 2);
  const float32 = new Float32Array(count);
  for (let i = 0; i < count; i++) {
    float32[i] = (data[i] - 127.5) / 127.5;
  }
  return float32;
}

export class RtlTcpClient {
  private socket: Socket | null = null;
  private connected = false;
  private handshake: RtlTcpHandshake | null = null;
  private receiveBuffer = Buffer.alloc(0);
  private pending: { bytes: number; resolve: (buf: Buffer) => void; reject: (err: Error) => void } | null = null;
  private maxBuffered = 0;
  private readTimeoutMs: number;

  constructor(private host: string, private port: number, private config: SDRConfig, options: RtlTcpClientOptions = {}) {
    this.readTimeoutMs = options.readTimeoutMs ?? READ_TIMEOUT_MS;
  }

  /**
   * Connect, complete the handshake and push the tuner settings.
   * Resolves with the tuner details, or null when the greeting was not RTL0.
   */
  async connect(): Promise<RtlTcpHandshake | null> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const fail = (err: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        this.socket?.destroy();
        reject(new HardwareError(`rtl_tcp at ${this.host}:${this.port}: ${err.message}`, { cause: err }));
      };
      const timeout = setTimeout(() => fail(new Error('connection timed out')), CONNECT_TIMEOUT_MS);

      this.socket = new Socket();

      this.socket.on('connect', () => {
        console.log(`📡 RTL-TCP connected to ${this.host}:${this.port}`);
        this.connected = true;
      });

      this.socket.on('data', (data: Buffer) => {
        if (settled) {
          this.onSamples(data);
          return;
        }
        // First 12 bytes = handshake
        this.receiveBuffer = Buffer.concat([this.receiveBuffer, data]);
        if (this.receiveBuffer.length < HANDSHAKE_BYTES) return;

        this.handshake = parseHandshake(this.receiveBuffer);
        if (this.handshake) {
          console.log(`📡 RTL-TCP handshake: tuner=${this.handshake.tunerType}, gains=${this.handshake.gainCount}`);
        } else {
          console.warn('📡 RTL-TCP: server did not send an RTL0 greeting, continuing anyway');
        }
        settled = true;
        clearTimeout(timeout);
        this.receiveBuffer = Buffer.alloc(0);

        this.setSampleRate(this.config.sampleRate);
        this.setFrequency(this.config.centerFrequency);
        this.setFrequencyCorrection(this.config.ppm);
        this.setGain(this.config.gain);

        resolve(this.handshake);
      });

      this.socket.on('error', (err) => {
        console.error(`📡 RTL-TCP error: ${err.message}`);
        this.connected = false;
        fail(err);
        this.failPending(new HardwareError(`rtl_tcp connection error: ${err.message}`, { cause: err }));
      });

      this.socket.on('close', () => {
        console.log(`📡 RTL-TCP disconnected from ${this.host}:${this.port}`);
        this.connected = false;
        fail(new Error('connection closed during handshake'));
        this.failPending(new HardwareError('rtl_tcp connection closed'));
      });

      this.socket.connect(this.port, this.host);
    });
  }

  /**
   * Next `length` complex samples. Anything buffered before the call is
   * discarded so each block reflects the signal at the time of the read.
   */
  readBlock(length: number): Promise<Float32Array> {
    if (!this.socket || !this.connected) {
      return Promise.reject(new HardwareError('rtl_tcp is not connected'));
    }
    if (this.pending) return Promise.reject(new HardwareError('a block read is already in progress'));

    const bytes = length * 2;
    this.maxBuffered = bytes;
    this.receiveBuffer = Buffer.alloc(0);

    return new Promise<Buffer>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new HardwareError(`no samples from rtl_tcp within ${this.readTimeoutMs} ms`));
      }, this.readTimeoutMs);
      this.pending = {
        bytes,
        resolve: (buf) => { clearTimeout(timer); resolve(buf); },
        reject: (err) => { clearTimeout(timer); reject(err); },
      };
    }).then(convertIQ);
  }

  disconnect() {
    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
    }
    this.connected = false;
    this.handshake = null;
  }

  private onSamples(data: Buffer) {
    this.receiveBuffer = Buffer.concat([this.receiveBuffer, data]);

    if (this.pending && this.receiveBuffer.length >= this.pending.bytes) {
      const { bytes, resolve } = this.pending;
      this.pending = null;
      resolve(this.receiveBuffer.subarray(0, bytes));
      this.receiveBuffer = Buffer.alloc(0);
      return;
    }

    // keep only the most recent block's worth between reads
    if (!this.pending && this.receiveBuffer.length > this.maxBuffered) {
      this.receiveBuffer = this.receiveBuffer.subarray(this.receiveBuffer.length - this.maxBuffered);
    }
  }

  private failPending(err: Error) {
    if (!this.pending) return;
    const { reject } = this.pending;
    this.pending = null;
    reject(err);
  }

  private sendCommand(cmd: number, value: number) {
    if (!this.socket || !this.connected) return;
    this.socket.write(encodeCommand(cmd, value));
  }

  setFrequency(freq: number) {
    this.config.centerFrequency = freq;
    this.sendCommand(CMD_SET_FREQUENCY, freq);
  }

  setSampleRate(rate: number) {
    this.config.sampleRate = rate;
    this.sendCommand(CMD_SET_SAMPLE_RATE, rate);
  }

  setGain(gain: number | 'auto') {
    this.config.gain = gain;
    if (gain === 'auto') {
      this.sendCommand(CMD_SET_GAIN_MODE, 0);
      this.sendCommand(CMD_SET_AGC_MODE, 1);
      return;
    }
    // Switch to manual gain mode first
    this.sendCommand(CMD_SET_GAIN_MODE, 1);
    // Gain in tenths of dB
    this.sendCommand(CMD_SET_GAIN, Math.round(gain * 10));
  }

  setFrequencyCorrection(ppm: number) {
    this.config.ppm = ppm;
    this.sendCommand(CMD_SET_FREQ_CORR, ppm);
  }
}
