const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * A dependant participates in a dependency cycle.
 *
 * `cycle` lists key labels from the first occurrence of the repeated key to
 * its repetition, e.g. `['A', 'B', 'A']`.
 */
export class CycleError extends Error {
  constructor(public cycle: string[]) {
    const cycleStr = cycle.join(' → ');
    const message = format(`Dependency cycle detected: ${cycleStr}`, [
      'Dependency cycle detected:',
      '',
      `  ${cycleStr}`,
      '',
      `This means ${cycle[cycle.length - 1]} depends on itself through other dependants.`,
      '',
      'Solutions:',
      `  1. Extract the shared part into a separate dependant`,
      `  2. Pass the value at execution time through 'values' instead of a parameter`,
    ]);
    super(message);
    this.name = 'CycleError';
  }
}

export class MissingBindingError extends Error {
  constructor(
    public key: string,
    public consumer?: string
  ) {
    const parts: string[] = [`No dependant can satisfy key '${key}'.`, ''];

    if (consumer) {
      parts.push('Required by:', `  ${consumer} → ${key}`, '');
    }

    parts.push(
      'To fix this:',
      `  1. Bind a dependant for '${key}' on the binding table`,
      `  2. Or give the parameter a default provider: param(${key}Key, { provider })`,
      `  3. Or mark the parameter optional: param(${key}Key, { required: false })`,
      ''
    );

    super(format(`No dependant can satisfy key '${key}'.`, parts));
    this.name = 'MissingBindingError';
  }
}

/**
 * A longer-lived dependant depends on a shorter-lived one.
 */
export class ScopeMismatchError extends Error {
  constructor(
    public consumerKey: string,
    public consumerScope: string,
    public dependencyKey: string,
    public dependencyScope: string
  ) {
    const dev = [
      `Scope mismatch: '${consumerKey}' (scope '${consumerScope}') ` +
        `cannot depend on '${dependencyKey}' (scope '${dependencyScope}').`,
      '',
      `Scope '${dependencyScope}' is entered inside '${consumerScope}', so a value cached in`,
      `'${consumerScope}' would outlive the value it was built from.`,
      '',
      'To fix this:',
      `  1. Move '${consumerKey}' into scope '${dependencyScope}'`,
      `  2. Or move '${dependencyKey}' into scope '${consumerScope}' or an outer scope`,
    ];
    super(format(`Scope mismatch: ${consumerScope} → ${dependencyScope}`, dev));
    this.name = 'ScopeMismatchError';
  }
}

export class UnknownScopeError extends Error {
  constructor(
    public key: string,
    public scope: string,
    public declaredScopes: string[]
  ) {
    const dev = [
      `Dependant '${key}' uses scope '${scope}', which is not declared.`,
      '',
      declaredScopes.length > 0
        ? `Declared scopes (outer first): ${declaredScopes.join(', ')}`
        : 'No scopes are declared.',
    ];
    super(format(`Unknown scope '${scope}' on '${key}'.`, dev));
    this.name = 'UnknownScopeError';
  }
}

/**
 * Two distinct dependants for the same key declare different scopes.
 */
export class ScopeConflictError extends Error {
  constructor(
    public key: string,
    public scopes: [string, string]
  ) {
    const dev = [
      `Key '${key}' is provided by dependants with different scopes ('${scopes[0]}' and '${scopes[1]}').`,
      '',
      'Dependants are identified by key, so both references collapse into one node.',
      '',
      'To fix this:',
      `  1. Use the same scope for every dependant of '${key}'`,
      `  2. Or give one of them its own key`,
    ];
    super(format(`Conflicting scopes for key '${key}'.`, dev));
    this.name = 'ScopeConflictError';
  }
}

export class ConstructionError extends Error {
  constructor(
    public key: string,
    cause: unknown
  ) {
    const dev = [
      'Construction failed',
      '',
      `Factory for '${key}' threw during creation. See 'cause' for details.`,
    ];
    super(format(`Factory for '${key}' failed during creation.`, dev), {
      cause: cause,
    });
    this.name = 'ConstructionError';
  }
}

/**
 * One or more cleanups failed while a scope was exiting.
 *
 * Every cleanup still ran; each failure is kept in `errors`, with the label of
 * the key whose value it belonged to at the same index in `keys`.
 */
export class CleanupErrors extends Error {
  constructor(
    public scope: string,
    public errors: Error[],
    public keys: string[]
  ) {
    const errorList = errors.map((e, i) => `  ${i + 1}. ${keys[i]}: ${e.message}`).join('\n');
    const dev = [
      `Cleanup failed while exiting scope '${scope}'`,
      '',
      `${errors.length} cleanup(s) failed:`,
      errorList,
      '',
      'Check the `errors` property for detailed information about each failure.',
    ];

    super(format(`${errors.length} cleanup error(s) in scope '${scope}'.`, dev));
    this.name = 'CleanupErrors';
  }
}

export class ScopeOrderError extends Error {
  constructor(
    public scope: string,
    public innermost: string | undefined
  ) {
    const dev = [
      'Scopes must exit in reverse order of entry',
      '',
      innermost
        ? `Cannot exit '${scope}' while '${innermost}' is still active inside it.`
        : `Cannot exit '${scope}': it is not on this scope stack.`,
    ];
    super(format(`Cannot exit scope '${scope}' out of order.`, dev));
    this.name = 'ScopeOrderError';
  }
}

export class DuplicateScopeError extends Error {
  constructor(public scope: string) {
    const dev = [
      `Scope '${scope}' has already been entered on this stack.`,
      '',
      'Use stack.fork() to run another instance of the scope concurrently.',
    ];
    super(format(`Scope '${scope}' has already been entered.`, dev));
    this.name = 'DuplicateScopeError';
  }
}

export class ScopeDisposedError extends Error {
  constructor(public scope: string) {
    const dev = [
      'Scope disposed',
      '',
      `Scope '${scope}' has exited. Do not construct or read values through its handle.`,
    ];
    super(format(`Scope '${scope}' has been disposed.`, dev));
    this.name = 'ScopeDisposedError';
  }
}

export class ScopeNotActiveError extends Error {
  constructor(
    public scope: string,
    public key: string,
    public activeScopes: string[]
  ) {
    const dev = [
      `Dependant '${key}' executes in scope '${scope}', which is not active.`,
      '',
      activeScopes.length > 0
        ? `Active scopes (outer first): ${activeScopes.join(', ')}`
        : 'No scopes are active.',
      '',
      `Enter '${scope}' before executing the plan.`,
    ];
    super(format(`Scope '${scope}' is not active.`, dev));
    this.name = 'ScopeNotActiveError';
  }
}

export class InvalidContainerConfigError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid container configuration', '', `Invalid container configuration: ${reason}`];
    super(format(`Invalid container configuration: ${reason}`, dev));
    this.name = 'InvalidContainerConfigError';
  }
}

export class InvalidKeyError extends Error {
  constructor(public key: unknown) {
    let keyString: string;
    try {
      keyString = JSON.stringify(key) ?? String(key);
    } catch {
      keyString = String(key);
    }

    const dev = [
      'Invalid key',
      '',
      `Expected a Key created with key('Name').`,
      '',
      'Received:',
      `  ${keyString}`,
    ];

    super(format('Invalid key.', dev));
    this.name = 'InvalidKeyError';
  }
}
