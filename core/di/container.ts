type Factory<S extends object, T> = (container: Container<S>) => T;

interface Provider<S extends object, T> {
  factory: Factory<S, T>;
  singleton: boolean;
}

type Providers<S extends object> = { [K in keyof S]?: Provider<S, S[K]> };
type Instances<S> = { [K in keyof S]?: { value: S[K] } };

/**
 * Minimal service container. The service map `S` types every token, so
 * `resolve('bus')` returns the bus type without a cast at the call site.
 */
export class Container<S extends object> {
  private readonly providers: Providers<S> = {};
  private readonly singletons: Instances<S> = {};
  private readonly resolving = new Set<keyof S>();

  register<K extends keyof S>(token: K, factory: Factory<S, S[K]>, options?: { singleton?: boolean }): void {
    assertToken(token);
    this.providers[token] = {
      factory,
      singleton: options?.singleton ?? false
    };
    delete this.singletons[token];
  }

  registerValue<K extends keyof S>(token: K, value: S[K]): void {
    assertToken(token);
    this.providers[token] = {
      factory: () => value,
      singleton: true
    };
    this.singletons[token] = { value };
  }

  has(token: keyof S): boolean {
    return this.providers[token] !== undefined;
  }

  resolve<K extends keyof S>(token: K): S[K] {
    const provider = this.providers[token];
    if (!provider) {
      throw new Error(`No provider registered for token: ${String(token)}`);
    }

    if (!provider.singleton) {
      return this.build(token, provider);
    }

    const cached = this.singletons[token];
    if (cached) {
      return cached.value;
    }

    const instance = this.build(token, provider);
    this.singletons[token] = { value: instance };
    return instance;
  }

  private build<K extends keyof S>(token: K, provider: Provider<S, S[K]>): S[K] {
    if (this.resolving.has(token)) {
      throw new Error(`Circular dependency while resolving token: ${String(token)}`);
    }
    this.resolving.add(token);
    try {
      return provider.factory(this);
    } finally {
      this.resolving.delete(token);
    }
  }
}

function assertToken(token: unknown): void {
  if (typeof token !== 'string' && typeof token !== 'symbol') {
    throw new Error('Token must be a string or symbol');
  }
  if (token === '__proto__' || token === 'constructor' || token === 'prototype') {
    throw new Error('Token must not shadow object internals');
  }
}
