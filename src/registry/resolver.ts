/**
 * Registry resolver
 *
 * Normalizes a configured source to a RegistryLocation.
 * Parse once, never parse again - downstream code only sees RegistryLocation.
 */

import type { SettingsSource } from "#/core";
import { RegistryLocation, stripCredentials } from "./location";

function normalizeSource(source: string | URL): URL {
  let url: URL;
  try {
    url = new URL(source.toString());
  } catch {
    throw new Error(`Invalid registry source: ${source}. Expected an absolute URI such as https://rubygems.org/`);
  }
  if (!url.pathname.endsWith("/")) {
    url.pathname = `${url.pathname}/`;
  }
  return url;
}

/**
 * Mirror configured for a source
 *
 * Priority:
 * 1. mirror.<source uri> (e.g. mirror.https://rubygems.org/)
 * 2. mirror.all
 */
export function mirrorFor(source: URL, settings: SettingsSource): URL | undefined {
  const key = stripCredentials(source).toString();
  const mirror = settings.get(`mirror.${key}`) ?? settings.get("mirror.all");
  return mirror ? normalizeSource(mirror) : undefined;
}

/**
 * Credentials configured for a source, as "user:password"
 *
 * Priority:
 * 1. Setting keyed by the full source URI
 * 2. Setting keyed by the host name
 */
export function credentialsFor(source: URL, settings: SettingsSource): string | undefined {
  return settings.get(stripCredentials(source).toString()) ?? settings.get(source.hostname);
}

/**
 * Resolve a configured source to the location a fetch session talks to:
 * mirror substitution first, then credential lookup for the final URI.
 * Credentials embedded in the URI take precedence over configured ones.
 */
export function resolveRegistryLocation(source: string | URL, settings: SettingsSource): RegistryLocation {
  const requested = normalizeSource(source);
  const uri = mirrorFor(requested, settings) ?? requested;
  return new RegistryLocation(uri, credentialsFor(uri, settings));
}
