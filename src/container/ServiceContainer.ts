/**
 * Simple Dependency Injection Container
 * Manages service lifecycles and dependencies
 */

import type { ServiceToken } from "./tokens";

export type ServiceFactory<T> = (container: ServiceContainer) => T;

type Lifetime = "singleton" | "transient" | "value";

interface ServiceRegistration<T> {
	factory: ServiceFactory<T>;
	lifetime: Lifetime;
	instance?: T;
	/** Set while the factory runs, to catch dependency cycles */
	resolving?: boolean;
}

interface Disposable {
	dispose(): void;
}

function isDisposable(value: unknown): value is Disposable {
	return (
		typeof value === "object" &&
		value !== null &&
		"dispose" in value &&
		typeof value.dispose === "function"
	);
}

/**
 * ServiceContainer for dependency injection
 * Supports singleton and transient services, and ready-made values
 */
export class ServiceContainer {
	private services = new Map<symbol, ServiceRegistration<unknown>>();

	/**
	 * Register a transient service (new instance on each resolve)
	 */
	register<T>(token: ServiceToken<T>, factory: ServiceFactory<NoInfer<T>>): void {
		this.services.set(token.key, { factory, lifetime: "transient" });
	}

	/**
	 * Register a singleton service, built on first resolve
	 */
	singleton<T>(token: ServiceToken<T>, factory: ServiceFactory<NoInfer<T>>): void {
		this.services.set(token.key, { factory, lifetime: "singleton" });
	}

	/**
	 * Register an existing value. Values are not disposed by the container.
	 */
	value<T>(token: ServiceToken<T>, instance: NoInfer<T>): void {
		this.services.set(token.key, { factory: () => instance, lifetime: "value", instance });
	}

	/**
	 * Resolve a service by token
	 * @throws Error if the service is not registered or depends on itself
	 */
	resolve<T>(token: ServiceToken<T>): T {
		const registration = this.services.get(token.key);

		if (!registration) {
			throw new Error(`Service not registered for token: ${token.key.toString()}`);
		}

		if (registration.lifetime !== "transient" && "instance" in registration) {
			// The map is keyed by the token that was registered with a factory for T
			return registration.instance as T;
		}

		if (registration.resolving) {
			throw new Error(`Circular dependency while resolving ${token.key.toString()}`);
		}

		registration.resolving = true;
		try {
			const instance = registration.factory(this);
			if (registration.lifetime === "singleton") {
				registration.instance = instance;
			}
			return instance as T;
		} finally {
			registration.resolving = false;
		}
	}

	has(token: ServiceToken<unknown>): boolean {
		return this.services.has(token.key);
	}

	/**
	 * Dispose every singleton built so far that has a dispose method
	 */
	dispose(): void {
		for (const registration of this.services.values()) {
			if (registration.lifetime === "singleton" && isDisposable(registration.instance)) {
				registration.instance.dispose();
			}
		}
		this.services.clear();
	}
}

export function createServiceContainer(): ServiceContainer {
	return new ServiceContainer();
}
