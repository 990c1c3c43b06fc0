/**
 * Step logger: prefixes each line with elapsed seconds and a step tag:
 *
 *   [0.4s] [PLAN] 31 steps planned
 */

export interface StepLogger {
  info(step: string, msg: string): void;
  error(step: string, msg: string): void;
}

export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function createStepLogger(
  sink: LogSink = consoleSink,
  now: () => number = Date.now,
): StepLogger {
  const startTime = now();

  function format(step: string, msg: string): string {
    const elapsed = ((now() - startTime) / 1000).toFixed(1);
    return `  [${elapsed}s] [${step}] ${msg}`;
  }

  return {
    info: (step, msg) => sink.out(format(step, msg)),
    error: (step, msg) => sink.err(format(step, msg)),
  };
}

/** Logger that drops everything; used where no output is wanted. */
export const silentLogger: StepLogger = {
  info: () => {},
  error: () => {},
};
