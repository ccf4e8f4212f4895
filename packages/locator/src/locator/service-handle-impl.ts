import { MultiError } from "@providence/shared";
import type { ActiveDescriptor } from "../api/active-descriptor.js";
import type { ServiceHandle } from "../api/service-handle.js";
import { isSingletonScope } from "../descriptors/contracts.js";
import { UnsupportedOperationError } from "../errors/index.js";
import type { ServiceLocatorImpl } from "./service-locator-impl.js";

export class ServiceHandleImpl implements ServiceHandle {
	private active = true;
	private created = false;
	private service: unknown;
	private readonly children: ServiceHandle[] = [];

	constructor(
		readonly locator: ServiceLocatorImpl,
		readonly descriptor: ActiveDescriptor,
	) {}

	/**
	 * Singletons come from the locator. Any other service is created on the
	 * first call and kept until the handle closes.
	 */
	getService(): unknown {
		if (!this.active) {
			throw new UnsupportedOperationError(`Handle for ${this.descriptor.toString()} is closed`);
		}
		if (isSingletonScope(this.descriptor.scopeAnnotation)) {
			return this.locator.getSingleton(this.descriptor);
		}
		if (!this.created) {
			this.service = this.descriptor.create(this);
			this.created = true;
		}
		return this.service;
	}

	isActive(): boolean {
		return this.active;
	}

	addChild(child: ServiceHandle): void {
		this.children.push(child);
	}

	/**
	 * Disposes the service, then closes child handles newest first. Every
	 * step runs; failures are thrown together afterwards.
	 */
	close(): void {
		if (!this.active) {
			return;
		}
		this.active = false;
		const errors: Error[] = [];

		if (this.created && !isSingletonScope(this.descriptor.scopeAnnotation)) {
			try {
				this.descriptor.dispose(this.service);
			} catch (err) {
				errors.push(...MultiError.flatten(err));
			}
		}
		this.service = undefined;
		this.created = false;

		for (const child of [...this.children].reverse()) {
			try {
				child.close();
			} catch (err) {
				errors.push(...MultiError.flatten(err));
			}
		}
		this.children.length = 0;

		if (errors.length > 0) {
			throw new MultiError(errors);
		}
	}
}
