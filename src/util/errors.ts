// src/util/errors.ts

/**
 * - precondition: document missing/present, unsafe destination, empty name
 * - resolution: no source files could be resolved for a target
 * - filesystem: a read or write failed
 * - process: an external tool could not be launched or exited non-zero
 * - config: qs.config.* is malformed
 */
export type QsErrorKind =
   | 'precondition'
   | 'resolution'
   | 'filesystem'
   | 'process'
   | 'config';

export class QsError extends Error {
   readonly kind: QsErrorKind;

   /**
    * Follow-up lines printed after the message, e.g. "Run 'qs init' first."
    */
   readonly hints: string[];

   constructor(kind: QsErrorKind, message: string, hints: string[] = []) {
      super(message);
      this.name = 'QsError';
      this.kind = kind;
      this.hints = hints;
   }
}

export function isQsError(err: unknown): err is QsError {
   return err instanceof QsError;
}

export function errorMessage(err: unknown): string {
   return err instanceof Error ? err.message : String(err);
}
