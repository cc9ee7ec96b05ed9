/** State behind the demo commands: an LED, a register file and a boot time. */
export class DemoBoard {
  led = false;
  readonly registers = new Uint8Array(256);
  private readonly bootedAt: number;
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
    this.bootedAt = now();
  }

  uptimeSeconds(): number {
    return Math.floor((this.now() - this.bootedAt) / 1000);
  }

  reset(): void {
    this.led = false;
    this.registers.fill(0);
  }
}
