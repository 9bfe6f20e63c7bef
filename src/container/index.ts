/**
 * Container module
 * Dependency injection container and tokens
 */

export { ServiceContainer, createServiceContainer } from "./ServiceContainer";
export type { ServiceFactory } from "./ServiceContainer";
export { TOKENS, createToken } from "./tokens";
export type { ServiceToken } from "./tokens";
export { registerServices, validateServiceRegistration } from "./registration";
