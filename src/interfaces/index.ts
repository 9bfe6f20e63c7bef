/**
 * Interfaces module
 * Exports all controller and service interfaces
 */

export type { IInputHandler } from "./IInputHandler";
export type { IAppLifecycle } from "./IAppLifecycle";
