import { randomUUID } from "node:crypto";

export interface IdGenerator {
  next(): string;
}

export class CryptoIdGenerator implements IdGenerator {
  next(): string {
    return randomUUID();
  }
}

export class SequentialIdGenerator implements IdGenerator {
  private counter = 0;

  constructor(private readonly prefix = "id") {}

  next(): string {
    this.counter += 1;
    return `${this.prefix}_${this.counter}`;
  }
}
