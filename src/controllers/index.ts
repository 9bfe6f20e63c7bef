/**
 * Controllers module
 * Exports all controllers
 */

export { InputHandler, mapKey } from "./InputHandler";
