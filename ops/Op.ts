import type { Logger } from 'pino';
import { getDefaultIO, type IOContext } from './IOContext.ts';
import type { Failure, Outcome, Success } from './Outcome.ts';

/**
 Base class for every unit of work in fwdctl.

 An op does one thing and reports how it went as an `Outcome`. Expected
 failures are returned, never thrown; callers branch on `outcome.failure`.
 */
export abstract class Op
{
  abstract readonly name: string;

  abstract run(io?: IOContext): Promise<Outcome<unknown, string>>;

  protected succeed<T>(value: T): Success<T>
  {
    return { ok: true, value };
  }

  protected fail<F extends string>(failure: F, debugData?: string): Failure<F>
  {
    return debugData === undefined ? { ok: false, failure } : { ok: false, failure, debugData };
  }

  protected failWithUnknownError(error: unknown): Failure<'UnknownError'>
  {
    return this.fail('UnknownError', error instanceof Error ? error.message : String(error));
  }

  protected getIO(io?: IOContext): IOContext
  {
    return io ?? getDefaultIO();
  }

  protected logger(io?: IOContext): Logger
  {
    return this.getIO(io).logger.child({ op: this.name });
  }

  /** Step-by-step detail, visible with --verbose. */
  protected log(io: IOContext | undefined, message: string): void
  {
    this.logger(io).debug(message);
  }

  protected info(io: IOContext | undefined, message: string): void
  {
    this.logger(io).info(message);
  }

  protected warn(io: IOContext | undefined, message: string): void
  {
    this.logger(io).warn(message);
  }

  protected error(io: IOContext | undefined, message: string): void
  {
    this.logger(io).error(message);
  }
}
