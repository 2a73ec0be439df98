import { GlanceError } from '../src/errors';

export function resumeHint(position: number): string {
  return `Stopped at word ${position}. Resume with: glance --skip ${position}`;
}

export function describeFailure(err: unknown, debug: boolean): string {
  if (!(err instanceof Error)) {
    return `Error: ${String(err)}`;
  }
  const summary = `${err.name}: ${err.message}`;
  // Expected failures never need a stack trace
  if (!debug || err instanceof GlanceError || err.stack === undefined) {
    return summary;
  }
  return err.stack;
}
