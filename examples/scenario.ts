import type { ILogger } from '../src';

/**
 * A runnable demo scenario. `run` writes its narrative to the logger and
 * returns what it computed so callers (and tests) can inspect it.
 */
export interface Scenario<TResult = unknown> {
  /** Menu key, e.g. `"3"` */
  readonly key: string;
  readonly title: string;
  run(logger: ILogger): TResult;
}
