/**
 * Injection tokens for the services composition.
 */

import type { ActiveDescriptor, ServiceLocator } from "@providence/locator";
import type { Logger, LoggerFactory } from "@providence/shared";
import type { Services } from "../services.js";
import type { ServicesConfig } from "../types/index.js";

export type Token<T> = symbol & { __type?: T };

/**
 * Creates a typed injection token using Symbol.for for consistency.
 */
export function createToken<T>(description: string): Token<T> {
	return Symbol.for(description) as Token<T>;
}

// ============================================================================
// Configuration
// ============================================================================

export const CONFIG = createToken<ServicesConfig>("ServicesConfig");

// ============================================================================
// Logging
// ============================================================================

export const LOGGER_FACTORY = createToken<LoggerFactory>("LoggerFactory");

export const LOGGER = createToken<Logger>("Logger");

// ============================================================================
// Locator
// ============================================================================

export const SERVICE_LOCATOR = createToken<ServiceLocator>("ServiceLocator");

/**
 * Descriptor of the installed discovery engine.
 */
export const PROVIDES_EXTENSION = createToken<ActiveDescriptor>("ProvidesExtension");

export const SERVICES = createToken<Services>("Services");
