import { utcNowIso } from "../time.js";

export interface Clock {
  nowIso(): string;
}

export class SystemClock implements Clock {
  nowIso(): string {
    return utcNowIso();
  }
}

export class FixedClock implements Clock {
  constructor(private current: string) {}

  nowIso(): string {
    return this.current;
  }

  set(iso: string): void {
    this.current = iso;
  }
}
