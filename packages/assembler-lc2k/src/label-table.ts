import { DuplicateLabelError, UndefinedLabelError } from './errors.js';
import type { SymbolEntry } from './types.js';

const LABEL_PATTERN = /^[A-Za-z][A-Za-z0-9]{0,5}$/;

export function isValidLabel(token: string): boolean {
  return LABEL_PATTERN.test(token);
}

// pass 2 からは参照のみ。
export interface ReadonlyLabelTable {
  readonly size: number;
  has(name: string): boolean;
  resolve(name: string): number;
  entries(): SymbolEntry[];
}

export class LabelTable implements ReadonlyLabelTable {
  private readonly addresses = new Map<string, number>();

  get size(): number {
    return this.addresses.size;
  }

  define(name: string, address: number): void {
    if (this.addresses.has(name)) {
      throw new DuplicateLabelError(name);
    }
    this.addresses.set(name, address);
  }

  has(name: string): boolean {
    return this.addresses.has(name);
  }

  resolve(name: string): number {
    const address = this.addresses.get(name);
    if (address === undefined) {
      throw new UndefinedLabelError(name);
    }
    return address;
  }

  entries(): SymbolEntry[] {
    return Array.from(this.addresses, ([name, address]) => ({ name, address }));
  }
}
