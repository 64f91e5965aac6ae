import chalk from 'chalk';

export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  verbose?: boolean;
  color?: boolean;
  out: LogSink;
  err: LogSink;
}

export interface Logger {
  /** Plain line on stdout, no prefix. */
  print(msg: string): void;
  /** Plain line on stderr, for messages that carry their own heading. */
  report(msg: string): void;
  info(msg: string): void;
  success(msg: string): void;
  error(msg: string): void;
  debug(msg: string): void;
  bench(msg: string): void;
}

export function createLogger(options: LoggerOptions): Logger {
  const c = new chalk.Instance({ level: options.color === false ? 0 : 1 });
  const { out, err } = options;
  const line = (sink: LogSink, msg: string) => {
    sink.write(`${msg}\n`);
  };

  return {
    print: (msg) => line(out, msg),
    report: (msg) => line(err, msg),
    info: (msg) => line(out, `${c.blue('ℹ️')}  ${msg}`),
    success: (msg) => line(out, `${c.green('✅')} ${msg}`),
    error: (msg) => line(err, `${c.red('❌')} ${msg}`),
    debug: (msg) => {
      if (options.verbose) line(err, c.dim(`🐛 ${msg}`));
    },
    bench: (msg) => line(out, `${c.yellow('📊')} ${msg}`),
  };
}
