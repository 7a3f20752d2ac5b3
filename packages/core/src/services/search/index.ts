/**
 * Search Provider implementations
 */

export { BraveSearchProvider, type BraveSearchProviderOptions } from "./brave-provider";
