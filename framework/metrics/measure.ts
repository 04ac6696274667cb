import {
  getLogger,
  loggerNameFromStack,
  type LoggerContext,
} from '../logging/loggerName';
import type { StructuredLogger } from '../logging/structuredLogger';
import { mergeTags, type TagInput, type TagSet } from './metricName';
import { whenSettled } from './settle';
import type { TaggedEmitter } from './taggedEmitter';

/**
 * How a method's owner shows up in the tags:
 * - `separate`: `def=<method>,class=<Class>`
 * - `qualified`: `def=<Class>.<method>`
 */
export type ClassNaming = 'separate' | 'qualified';

export interface MeasureOptions {
  extraTags?: TagInput;
  /** Overrides the function's own `name` for the `def` tag. */
  name?: string;
  /** Owner name; when absent, the class defining the method is found from the receiver. */
  className?: string;
  classNaming?: ClassNaming;
  log?: boolean;
  logger?: StructuredLogger;
  /** Names the call logger; the caller's stack frame is used when absent. */
  loggerContext?: LoggerContext;
}

export type Measurer = <This, A extends unknown[], R>(
  fn: (this: This, ...args: A) => R,
) => (this: This, ...args: A) => R;

export function inferClassName(receiver: unknown): string | undefined {
  if (typeof receiver === 'function') {
    return receiver.name || undefined;
  }
  if (typeof receiver !== 'object' || receiver === null) {
    return undefined;
  }
  const ctor: unknown = receiver.constructor;
  if (typeof ctor !== 'function' || ctor === Object) {
    return undefined;
  }
  return ctor.name || undefined;
}

/**
 * Name of the class that holds `method`: the owning prototype's constructor
 * for instance methods, the owning class itself for statics. Inherited calls
 * report the ancestor that defines the method, not the receiver's class.
 */
export function definingClassName(receiver: unknown, method: unknown): string | undefined {
  let holder: object | null =
    typeof receiver === 'function'
      ? receiver
      : typeof receiver === 'object' && receiver !== null
        ? Object.getPrototypeOf(receiver)
        : null;

  while (holder !== null) {
    const current = holder;
    const owns = Reflect.ownKeys(current).some(
      (key) => Object.getOwnPropertyDescriptor(current, key)?.value === method,
    );
    if (owns) {
      return inferClassName(current);
    }
    holder = Object.getPrototypeOf(current);
  }
  return undefined;
}

export function measurementTags(
  def: string,
  className: string | undefined,
  extraTags: TagInput = {},
  classNaming: ClassNaming = 'separate',
): TagSet {
  if (classNaming === 'qualified') {
    const qualified = className && className !== def ? `${className}.${def}` : def;
    return mergeTags(new Map([['def', qualified]]), extraTags);
  }

  // compared against def as it stands after extraTags had their say
  const tags = mergeTags(new Map([['def', def]]), extraTags);
  if (className && className !== tags.get('def')) {
    tags.set('class', className);
  }
  return tags;
}

function logCall<R>(
  logger: StructuredLogger,
  fn: string,
  args: readonly unknown[],
  invoke: () => R,
): R {
  const t0 = new Date();
  logger.info('measure begin', { t0: t0.toISOString(), fn, args });

  return whenSettled(invoke, (outcome) => {
    const t1 = new Date();
    logger.info('measure end', {
      t0: t0.toISOString(),
      t1: t1.toISOString(),
      delta: (t1.getTime() - t0.getTime()) / 1000,
      fn,
      args,
      outcome: outcome.ok ? 'success' : 'failure',
      ...(outcome.ok ? {} : { error: outcome.error }),
    });
  });
}

type OwnerResolver = (receiver: unknown, measured: unknown) => string | undefined;

function ownerFromReceiver(): OwnerResolver {
  const cache = new WeakMap<object, string | undefined>();
  return (receiver, measured) => {
    const start: object | null =
      typeof receiver === 'function'
        ? receiver
        : typeof receiver === 'object' && receiver !== null
          ? Object.getPrototypeOf(receiver)
          : null;
    if (start === null) return undefined;
    if (cache.has(start)) return cache.get(start);

    const owner = definingClassName(receiver, measured) ?? inferClassName(receiver);
    cache.set(start, owner);
    return owner;
  };
}

function wrapMeasured<This, A extends unknown[], R>(
  emitter: TaggedEmitter,
  options: MeasureOptions,
  fn: (this: This, ...args: A) => R,
  resolveOwner: OwnerResolver,
): (this: This, ...args: A) => R {
  const { extraTags, classNaming = 'separate', log = false } = options;
  const fixedLogger =
    options.logger ?? (log && options.loggerContext ? getLogger(options.loggerContext) : undefined);
  const def = options.name ?? (fn.name || 'anonymous');

  const measured = function (this: This, ...args: A): R {
    const className = options.className ?? resolveOwner(this, measured);
    const tags = measurementTags(def, className, extraTags, classNaming);
    const invoke = (): R => fn.apply(this, args);

    let call = invoke;
    if (log) {
      const logger =
        fixedLogger ??
        getLogger(loggerNameFromStack(1, new Error().stack) ?? { module: 'measure', functionName: def });
      call = () => logCall(logger, def, args, invoke);
    }

    return emitter.scopedExtraTags(tags, () => {
      emitter.incr('calls');
      return emitter.timer('duration', call);
    });
  };

  Object.defineProperty(measured, 'name', { value: def });
  return measured;
}

/**
 * Wraps a function so each call emits a `calls` counter and a `duration`
 * timer, tagged with `def` (and `class` for methods) on top of the
 * emitter's own tags. Async functions are timed until their promise
 * settles. The emitter is not injected into the call; close over it.
 *
 * Without `className`, the class is the one whose prototype holds the
 * wrapped function, found from the receiver on first call.
 */
export function measure(emitter: TaggedEmitter, options: MeasureOptions = {}): Measurer {
  return <This, A extends unknown[], R>(fn: (this: This, ...args: A) => R) =>
    wrapMeasured(emitter, options, fn, ownerFromReceiver());
}

/**
 * Method decorator form of `measure`; `def` comes from the decorated
 * member's name. Static methods resolve their class once, when the class is
 * defined; instance methods report the class that declares them.
 */
export function measureMethod(emitter: TaggedEmitter, options: MeasureOptions = {}) {
  return function <This, A extends unknown[], R>(
    target: (this: This, ...args: A) => R,
    context: ClassMethodDecoratorContext<This, (this: This, ...args: A) => R>,
  ): (this: This, ...args: A) => R {
    const methodOptions: MeasureOptions = { name: String(context.name), ...options };

    if (context.static) {
      let owner: string | undefined;
      context.addInitializer(function () {
        owner = inferClassName(this);
      });
      return wrapMeasured(emitter, methodOptions, target, () => owner);
    }

    return wrapMeasured(emitter, methodOptions, target, ownerFromReceiver());
  };
}
