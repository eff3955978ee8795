import { TesseraErrorCode, isIdentifier } from '@tessera/types';
import type { CallNode } from './types.js';
import type { ShortcodeArgs } from './args.js';
import { RegistryError } from './errors.js';

/**
 * Renders one directive call. Return the replacement text, or throw to
 * report a failure; the evaluator wraps whatever is thrown in a
 * `DirectiveFailedError`.
 */
export type ShortcodeHandler = (args: ShortcodeArgs, call: CallNode) => string;

/**
 * Name-to-handler lookup consulted by the evaluator. A
 * `Map<string, ShortcodeHandler>` satisfies it.
 */
export interface FunctionRegistry {
  get(name: string): ShortcodeHandler | undefined;
}

/**
 * A {@link FunctionRegistry} that validates names on registration and can
 * be frozen once set up, after which it is safe to share between
 * concurrent renders.
 *
 * @example
 * ```typescript
 * const registry = new ShortcodeRegistry()
 *   .register('upper', (args) => args.string('text').toUpperCase())
 *   .freeze();
 * ```
 */
export class ShortcodeRegistry implements FunctionRegistry {
  private readonly handlers = new Map<string, ShortcodeHandler>();
  private frozen = false;

  /** Build a registry from a record of handlers. */
  static from(handlers: Record<string, ShortcodeHandler>): ShortcodeRegistry {
    const registry = new ShortcodeRegistry();
    for (const [name, handler] of Object.entries(handlers)) {
      registry.register(name, handler);
    }
    return registry;
  }

  /**
   * Register `handler` under `name`.
   *
   * @throws {RegistryError} When the registry is frozen, the name is not an
   *   identifier (and so could never be called), or the name is taken.
   */
  register(name: string, handler: ShortcodeHandler): this {
    if (this.frozen) {
      throw new RegistryError(
        TesseraErrorCode.REGISTRY_FROZEN,
        `Cannot register "${name}": the registry is frozen`,
      );
    }
    if (!isIdentifier(name)) {
      throw new RegistryError(
        TesseraErrorCode.REGISTRY_CONFLICT,
        `"${name}" is not a valid directive name. Names start with a letter or underscore and contain only letters, digits and underscores`,
      );
    }
    if (this.handlers.has(name)) {
      throw new RegistryError(
        TesseraErrorCode.REGISTRY_CONFLICT,
        `A handler named "${name}" is already registered`,
      );
    }
    this.handlers.set(name, handler);
    return this;
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  get(name: string): ShortcodeHandler | undefined {
    return this.handlers.get(name);
  }

  /** Registered names in registration order. */
  names(): string[] {
    return [...this.handlers.keys()];
  }

  /** Reject further registration. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }
}
