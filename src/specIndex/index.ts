/**
 * Spec index module
 *
 * Package specs and the index a resolver consumes.
 */

export * from "./specIndex.types";
export { PackageIndex, buildIndex } from "./specIndex";
export { EndpointSpecification, RemoteSpecification, fullNameOf, isDefaultPlatform } from "./packageSpec";
