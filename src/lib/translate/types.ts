import { TranslationDegraded, type DegradationReason } from '@/lib/errors';

/**
 * Result of a translation pass: the best-effort value plus every
 * degradation that happened on the way.
 */
export interface Translation<T> {
  value: T;
  degradations: TranslationDegraded[];
}

export class DegradationLog {
  readonly entries: TranslationDegraded[] = [];

  add(reason: DegradationReason, subject: string, detail?: string): void {
    this.entries.push(new TranslationDegraded(reason, subject, detail));
  }

  result<T>(value: T): Translation<T> {
    return { value, degradations: this.entries };
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
