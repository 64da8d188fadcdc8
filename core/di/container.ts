/**
 * Typed token: the phantom `T` ties a registration to the type it resolves to.
 */
export interface Token<T> {
  readonly key: symbol;
  readonly name: string;
  /** Never set; carries the resolved type. */
  readonly __type?: T;
}

export function createToken<T>(name: string): Token<T> {
  return { key: Symbol(name), name };
}

type Factory<T> = (container: Container) => T;

interface Provider<T> {
  factory: Factory<T>;
  singleton: boolean;
}

export class Container {
  private readonly providers = new Map<symbol, Provider<unknown>>();
  private readonly singletons = new Map<symbol, unknown>();

  register<T>(token: Token<T>, factory: Factory<T>, options?: { singleton?: boolean }): void {
    this.providers.set(token.key, {
      factory,
      singleton: options?.singleton ?? false
    });
    this.singletons.delete(token.key);
  }

  registerValue<T>(token: Token<T>, value: T): void {
    this.providers.set(token.key, {
      factory: () => value,
      singleton: true
    });
    this.singletons.set(token.key, value);
  }

  has(token: Token<unknown>): boolean {
    return this.providers.has(token.key);
  }

  resolve<T>(token: Token<T>): T {
    const provider = this.providers.get(token.key);
    if (!provider) {
      throw new Error(`No provider registered for token: ${token.name}`);
    }

    if (provider.singleton) {
      if (this.singletons.has(token.key)) {
        return this.singletons.get(token.key) as T;
      }

      const instance = provider.factory(this) as T;
      this.singletons.set(token.key, instance);
      return instance;
    }

    return provider.factory(this) as T;
  }
}
