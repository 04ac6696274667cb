import {
  createStructuredLogger,
  type LogSink,
  type StructuredLogger,
} from './structuredLogger';

export interface LoggerContext {
  module: string;
  className?: string;
  functionName?: string;
}

/** `<module>[.<class>][.<function>]` */
export function resolveLoggerName({ module, className, functionName }: LoggerContext): string {
  return [module, className, functionName].filter((part) => !!part).join('.');
}

const FRAME_PATTERN = /^\s*at (?:async )?(?:new )?(?:(.+?) \()?(.+?):\d+:\d+\)?$/;

function moduleFromLocation(location: string): string {
  const withoutScheme = location.replace(/^file:\/\//, '');
  const base = withoutScheme.split(/[\\/]/).pop() ?? withoutScheme;
  return base.replace(/\.[cm]?[jt]sx?$/, '');
}

function parseFrame(frame: string): LoggerContext | undefined {
  const match = FRAME_PATTERN.exec(frame);
  if (!match) return undefined;

  const [, callee, location] = match;
  const module = moduleFromLocation(location);
  if (!callee) {
    return { module };
  }

  const qualified = callee.replace(/ \[as [^\]]+\]$/, '');
  const dot = qualified.lastIndexOf('.');
  const owner = dot >= 0 ? qualified.slice(0, dot).split('.').pop() : undefined;
  const fn = dot >= 0 ? qualified.slice(dot + 1) : qualified;

  return {
    module,
    className: owner && owner !== 'Object' ? owner : undefined,
    functionName: fn && fn !== '<anonymous>' ? fn : undefined,
  };
}

/**
 * Derives a logger context from a V8 stack trace. Frame 0 is the function
 * that captured the stack (this one, when `stack` is omitted), so the
 * default of 1 names the direct caller.
 */
export function loggerNameFromStack(
  skipFrames = 1,
  stack: string | undefined = new Error().stack,
): LoggerContext | undefined {
  if (!stack) return undefined;
  const frames = stack.split('\n').filter((line) => /^\s*at /.test(line));
  const frame = frames[skipFrames];
  return frame ? parseFrame(frame) : undefined;
}

const namingLogger = createStructuredLogger({ component: 'logging.loggerName' });

export interface GetLoggerOptions {
  sink?: LogSink;
}

export function getLogger(context: LoggerContext, options: GetLoggerOptions = {}): StructuredLogger {
  const name = resolveLoggerName(context);
  if (!context.functionName) {
    const warnWith = options.sink
      ? createStructuredLogger({ component: 'logging.loggerName', sink: options.sink })
      : namingLogger;
    warnWith.warn('module-level logger requested', { name });
  }
  return createStructuredLogger({ component: name, sink: options.sink });
}
