/**
 * Container for the services wiring, backed by inversify. Every binding is
 * resolved once: the locator, the discovery engine and the facade are
 * process-wide for one `Services`.
 */

import "reflect-metadata";
import { Container as InversifyContainer } from "inversify";
import type { Token } from "./tokens.js";

export type Factory<T> = (container: Container) => T;

export interface Container {
	/**
	 * The factory runs on first resolution; later resolutions share its result.
	 */
	singleton<T>(token: Token<T>, factory: Factory<T>): void;

	instance<T>(token: Token<T>, value: T): void;

	/**
	 * @throws Error if the token is not registered.
	 */
	resolve<T>(token: Token<T>): T;

	has<T>(token: Token<T>): boolean;
}

export class ContainerImpl implements Container {
	private readonly bindings = new InversifyContainer({ defaultScope: "Singleton" });

	singleton<T>(token: Token<T>, factory: Factory<T>): void {
		this.bindings
			.bind<T>(token)
			.toDynamicValue(() => factory(this))
			.inSingletonScope();
	}

	instance<T>(token: Token<T>, value: T): void {
		this.bindings.bind<T>(token).toConstantValue(value);
	}

	resolve<T>(token: Token<T>): T {
		if (!this.has(token)) {
			throw new Error(`No registration found for token: ${token.toString()}`);
		}
		return this.bindings.get<T>(token);
	}

	has<T>(token: Token<T>): boolean {
		return this.bindings.isBound(token);
	}
}

export function createContainer(): Container {
	return new ContainerImpl();
}
