import type { Puppet } from '@chatplug/core';

/**
 * Base for everything looked up through the puppet by id. The payload is
 * fetched once by `ready()` and read synchronously afterwards.
 */
export abstract class Accessory<P> {
  private payload: P | null = null;

  constructor(
    protected readonly puppet: Puppet,
    readonly id: string,
  ) {}

  protected abstract loadPayload(): Promise<P>;

  isReady(): boolean {
    return this.payload !== null;
  }

  async ready(): Promise<void> {
    if (this.payload === null) {
      this.payload = await this.loadPayload();
    }
  }

  protected requirePayload(): P {
    if (this.payload === null) {
      throw new Error(`${this.constructor.name} <${this.id}> is not ready, call ready() first`);
    }
    return this.payload;
  }

  toString(): string {
    return `${this.constructor.name}<${this.id}>`;
  }
}
