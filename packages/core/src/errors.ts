/**
 * Errors raised by the plugin layer. None of them is swallowed internally;
 * they always reach the caller of the registry or the dispatcher.
 */

export class PluginError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** An operation named a plugin that is not registered. */
export class PluginNotFoundError extends PluginError {
  constructor(readonly pluginName: string) {
    super(`plugin <${pluginName}> does not exist`);
  }
}

/** A locator string could not be resolved to a plugin instance. */
export class PluginLoadError extends PluginError {
  constructor(
    readonly locator: string,
    reason = 'no loader could resolve it',
  ) {
    super(`can't load plugin <${locator}>: ${reason}`);
  }
}

/** A plugin already bound to one runtime was handed to another. */
export class PluginBindingError extends PluginError {
  constructor(readonly pluginName: string) {
    super(`plugin <${pluginName}> is already bound to another runtime`);
  }
}

/** Event arguments do not match the arity or types declared for the kind. */
export class EventContractViolation extends PluginError {
  constructor(
    readonly kind: string,
    readonly received: number,
    detail: string,
  ) {
    super(`invalid arguments for "${kind}" event (received ${received}): ${detail}`);
  }
}
