/**
 * Registry module
 *
 * Registry locations and the credential / mirror resolution that produces them.
 */

export { RegistryLocation, stripCredentials } from "./location";
export { resolveRegistryLocation, mirrorFor, credentialsFor } from "./resolver";
