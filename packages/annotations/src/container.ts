/**
 * Container-facing surface the generated registration module is written against.
 *
 * wirekit does not ship a container; any container that accepts string tokens
 * and reads `static inject` lists can implement these interfaces.
 */

/** Token for "every implementation registered under `all`". */
export interface AllToken {
  readonly all: string;
}

export type InjectToken = string | AllToken;

export type Constructable<T = unknown> = new (...args: never[]) => T;

export type Factory<T = unknown> = (provider: ServiceProvider) => T;

export interface ServiceProvider {
  get<T = unknown>(token: string): T;
  getAll<T = unknown>(token: string): readonly T[];
}

export interface ServiceCollection {
  addSingleton(token: string, implementation: Constructable | Factory): ServiceCollection;
  addScoped(token: string, implementation: Constructable | Factory): ServiceCollection;
  addTransient(token: string, implementation: Constructable | Factory): ServiceCollection;
}

export interface Configuration {
  get(key: string): string | undefined;
}

export function all(token: string): AllToken {
  return { all: token };
}

export function isAllToken(token: InjectToken): token is AllToken {
  return typeof token === "object";
}
