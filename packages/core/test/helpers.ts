// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Transport } from "../src/index.js";

/**
 * Transport double that records every message and can be told to fail
 * or to hold a send open until the test releases it.
 */
export class RecordingTransport implements Transport {
  readonly sent: Uint8Array[] = [];
  closeCalls = 0;

  private failures: Error[] = [];
  private gate: Promise<void> | null = null;
  private openGate: (() => void) | null = null;

  async send(message: Uint8Array): Promise<void> {
    if (this.gate) {
      await this.gate;
    }
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
    this.sent.push(message);
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }

  /** Reject the next send with `error` */
  failNext(error: Error): void {
    this.failures.push(error);
  }

  /** Hold every send until `release()` is called */
  hold(): void {
    this.gate = new Promise<void>((resolve) => {
      this.openGate = resolve;
    });
  }

  release(): void {
    this.openGate?.();
    this.gate = null;
    this.openGate = null;
  }

  texts(): string[] {
    const decoder = new TextDecoder();
    return this.sent.map((message) => decoder.decode(message));
  }
}
