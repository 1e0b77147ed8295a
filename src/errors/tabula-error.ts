/**
 * Základní chybová třída pro všechny chyby enginu.
 *
 * Každá podtřída nese stabilní `code` a `statusCode`, takže vnější API vrstva
 * je může mapovat bez řetězení `instanceof`:
 *
 * ```typescript
 * try {
 *   await engine.evaluate(fact, 'discounts');
 * } catch (err) {
 *   if (err instanceof TabulaError) {
 *     reply.status(err.statusCode).send({ code: err.code, message: err.message });
 *   }
 * }
 * ```
 */
export class TabulaError extends Error {
  readonly statusCode: number = 500;
  readonly code: string = 'TABULA_ERROR';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TabulaError';
  }
}

/** Neplatný vstup na nejvyšší úrovni (null fakt, prázdná dávka, ...). */
export class InvalidInputError extends TabulaError {
  override readonly statusCode = 400;
  override readonly code = 'INVALID_INPUT';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/** Úloha byla zrušena přes AbortSignal. */
export class TaskAbortedError extends TabulaError {
  override readonly statusCode = 499;
  override readonly code = 'TASK_ABORTED';
  /** Zda úloha v okamžiku zrušení už běžela (a doběhne na pozadí) */
  readonly started: boolean;

  constructor(started: boolean, reason?: unknown) {
    super(started ? 'Task was aborted after it started' : 'Task was aborted before it started', {
      cause: reason,
    });
    this.name = 'TaskAbortedError';
    this.started = started;
  }
}
