import {
  ReflectionError,
  TrackInit,
  adaptStalePatch,
  declareExtensions,
  isOpaqueDispatch,
  reflectSignature,
  setPatchedMethod,
  unwrapPatch,
} from '@initrack/tracker';

function canonical(x: number, { outputAttentions = false, returnDict = false } = {}) {
  return [x, outputAttentions, returnDict];
}

class Owner {}

function call(fn: unknown, thisArg: unknown, ...args: unknown[]): unknown {
  if (typeof fn !== 'function') throw new Error('not callable');
  return Reflect.apply(fn, thisArg, args);
}

const stalePrefix = '[initrack][stale-patch] The `forward` method of Owner is patched and the patch might';
const staleSuffix = 'Compatibility for these arguments is added automatically; the patch may need to be updated.';

test('a patch accepting every extension comes back unchanged', () => {
  const logger = jest.fn();
  function newer(x: number, { outputHiddenStates = false, outputAttentions = false, returnDict = false } = {}) {
    return [x, outputHiddenStates, outputAttentions, returnDict];
  }
  expect(adaptStalePatch(canonical, newer, Owner, { logger })).toBe(newer);
  expect(logger).not.toHaveBeenCalled();
});

test('missing extensions are stripped from the keyword bag', () => {
  const logger = jest.fn();
  const calls: unknown[][] = [];
  function stale(this: unknown, x: number, { returnDict = false } = {}) {
    calls.push([this, x, returnDict, arguments.length]);
    return x;
  }
  const wrapped = adaptStalePatch(canonical, stale, Owner, { logger });
  expect(wrapped).not.toBe(stale);
  const self = {};
  expect(call(wrapped, self, 5, { outputAttentions: true, returnDict: true })).toBe(5);
  call(wrapped, self, 6);
  call(wrapped, self, 7, { outputAttentions: true });
  expect(calls).toEqual([
    [self, 5, true, 2],
    [self, 6, false, 1],
    [self, 7, false, 2],
  ]);
  expect(logger).toHaveBeenCalledTimes(1);
});

test('the wrapper reflects as the canonical signature and unwraps to the patch', () => {
  function stale(x: number) {
    return x;
  }
  const wrapped = adaptStalePatch(canonical, stale, Owner, { logger: jest.fn() });
  expect(reflectSignature(wrapped)).toEqual(reflectSignature(canonical));
  if (typeof wrapped !== 'function') throw new Error('expected a wrapper');
  expect(unwrapPatch(wrapped)).toBe(stale);
  expect(wrapped.name).toBe('stale');
});

test('diagnostic wording depends on where the patch comes from', () => {
  function stale(x: number) {
    return x;
  }
  const logger = jest.fn();
  adaptStalePatch(canonical, stale, Owner, { logger });
  adaptStalePatch(canonical, stale, Owner, { logger, origin: 'initrack' });
  adaptStalePatch(canonical, stale, Owner, { logger, origin: 'other-lib', library: 'other-lib' });
  const missing = ['outputAttentions', 'returnDict'];
  expect(logger).toHaveBeenNthCalledWith(
    1,
    `${stalePrefix} conflict with patches made by initrack which seem to have more arguments such as ["outputAttentions","returnDict"]. ${staleSuffix}`,
    { owner: 'Owner', missing }
  );
  expect(logger).toHaveBeenNthCalledWith(
    2,
    `${stalePrefix} be based on an old version which misses some arguments compared with the latest, such as ["outputAttentions","returnDict"]. ${staleSuffix}`,
    { owner: 'Owner', missing }
  );
  expect(logger.mock.calls[2][0]).toBe(
    `${stalePrefix} be based on an old version which misses some arguments compared with the latest, such as ["outputAttentions","returnDict"]. ${staleSuffix}`
  );
});

test('declared extensions replace parameter sniffing', () => {
  const logger = jest.fn();
  const passthrough = declareExtensions(function (this: unknown, ...args: unknown[]) {
    return args;
  }, ['outputAttentions', 'returnDict']);
  expect(adaptStalePatch(canonical, passthrough, Owner, { logger })).toBe(passthrough);

  const partial = declareExtensions((...args: unknown[]) => args, ['returnDict']);
  const wrapped = adaptStalePatch(canonical, partial, Owner, { logger });
  expect(call(wrapped, undefined, 1, { outputAttentions: true, returnDict: true })).toEqual([1, { returnDict: true }]);
  expect(call(wrapped, undefined, 1, { outputAttentions: true })).toEqual([1, {}]);
  expect(logger).toHaveBeenCalledTimes(1);
});

test('a patch with a keyword rest understands every extension', () => {
  function loose(x: number, { ...rest }: Record<string, unknown> = {}) {
    return [x, rest];
  }
  expect(adaptStalePatch(canonical, loose, Owner, { logger: jest.fn() })).toBe(loose);
});

test('without a canonical method any patch is accepted', () => {
  function stale(x: number) {
    return x;
  }
  expect(adaptStalePatch(undefined, stale, Owner)).toBe(stale);
});

test('opaque compiled dispatch objects are stored as is', () => {
  class CompiledStaticFunction {
    run() {
      return 0;
    }
  }
  const compiled = new CompiledStaticFunction();
  const logger = jest.fn();
  expect(isOpaqueDispatch(compiled)).toBe(true);
  expect(adaptStalePatch(canonical, compiled, Owner, { logger })).toBe(compiled);
  expect(logger).not.toHaveBeenCalled();
});

test('a non-callable patch is rejected', () => {
  expect(() => adaptStalePatch(canonical, 42, Owner)).toThrow(ReflectionError);
});

@TrackInit({ logger: () => undefined })
class Model {
  constructor(readonly width = 1) {}

  forward(x: number, { outputHiddenStates = false, outputAttentions = false, returnDict = false } = {}) {
    return [x * this.width, outputHiddenStates, outputAttentions, returnDict];
  }
}

class Plain {
  forward(x: number, { outputAttentions = false } = {}) {
    return [x, outputAttentions];
  }
}

const originalForward = Model.prototype.forward;

describe('setPatchedMethod on tracked classes', () => {
  afterEach(() => {
    Object.defineProperty(Model.prototype, 'forward', { value: originalForward, writable: true, configurable: true });
  });

  test('a class-level stale patch receives the instance and the stripped call', () => {
    const received: { self: unknown; args: unknown[] }[] = [];
    function forward(this: unknown, x: number) {
      received.push({ self: this, args: Array.from(arguments) });
      return x;
    }
    const logger = jest.fn();
    setPatchedMethod(Model, 'forward', forward, { logger });
    const model = new Model(3);
    model.forward(5, { outputAttentions: true });
    expect(received).toEqual([{ self: model, args: [5] }]);
    expect(logger).toHaveBeenCalledWith(expect.stringContaining('["outputHiddenStates","outputAttentions","returnDict"]'), {
      owner: 'Model',
      missing: ['outputHiddenStates', 'outputAttentions', 'returnDict'],
    });
  });

  test('assigning the same patch twice adapts it once', () => {
    function stale(x: number, { returnDict = false } = {}) {
      return [x, returnDict];
    }
    const logger = jest.fn();
    const first = setPatchedMethod(Model, 'forward', stale, { logger });
    const second = setPatchedMethod(Model, 'forward', first, { logger });
    expect(second).toBe(first);
    expect(Model.prototype.forward).toBe(first);
    expect(logger).toHaveBeenCalledTimes(1);
    expect(new Model().forward(2, { outputAttentions: true, returnDict: true })).toEqual([2, true]);
  });

  test('instance-level patches bind to their instance', () => {
    const seen: unknown[] = [];
    function stale(this: unknown, x: number) {
      seen.push(this);
      return x;
    }
    const model = new Model();
    setPatchedMethod(model, 'forward', stale, { logger: jest.fn() });
    expect(Object.keys(model)).toContain('forward');
    const { forward } = model;
    forward(4, { returnDict: true });
    expect(seen).toEqual([model]);
  });

  test('a bound patch keeps its own receiver when it declares its extensions', () => {
    const target = { label: 'bound-target' };
    const seen: unknown[] = [];
    function stale(this: unknown, x: number) {
      seen.push(this);
      return x;
    }
    const bound = declareExtensions(stale.bind(target), []);
    const model = new Model();
    setPatchedMethod(model, 'forward', bound, { logger: jest.fn() });
    model.forward(1, { returnDict: true });
    expect(seen).toEqual([target]);
  });

  test('other method names and untracked classes are stored unchanged', () => {
    const logger = jest.fn();
    function describeModel() {
      return 'model';
    }
    function stale(x: number) {
      return [x];
    }
    expect(setPatchedMethod(Model, 'describe', describeModel, { logger })).toBe(describeModel);
    expect(setPatchedMethod(Plain, 'forward', stale, { logger })).toBe(stale);
    expect(Plain.prototype.forward).toBe(stale);
    expect(logger).not.toHaveBeenCalled();
  });
});
