/**
 * Registry location
 *
 * A registry URI that may carry basic-auth credentials. The credential-free
 * form is the only one that is ever logged, displayed or put in an error.
 */

const INSPECT = Symbol.for("nodejs.util.inspect.custom");

function withTrailingSlash(url: URL): URL {
  const copy = new URL(url.toString());
  if (!copy.pathname.endsWith("/")) {
    copy.pathname = `${copy.pathname}/`;
  }
  return copy;
}

export function stripCredentials(url: URL): URL {
  const copy = new URL(url.toString());
  copy.username = "";
  copy.password = "";
  return copy;
}

export class RegistryLocation {
  private readonly original: URL;
  private readonly anonymous: URL;

  /**
   * @param uri - Registry URI, possibly with embedded credentials
   * @param fallbackAuth - "user:password" from settings; used only when the URI has none
   */
  constructor(uri: URL | string, fallbackAuth?: string) {
    const url = withTrailingSlash(typeof uri === "string" ? new URL(uri) : uri);

    if (fallbackAuth && !url.username && !url.password) {
      const separator = fallbackAuth.indexOf(":");
      // URL setters percent-encode; the request layer decodes again
      url.username = separator === -1 ? fallbackAuth : fallbackAuth.slice(0, separator);
      url.password = separator === -1 ? "" : fallbackAuth.slice(separator + 1);
    }

    this.original = url;
    this.anonymous = stripCredentials(url);
  }

  /** URI including credentials; for the request layer only */
  get uri(): URL {
    return new URL(this.original.toString());
  }

  get withoutCredentials(): URL {
    return new URL(this.anonymous.toString());
  }

  get hasCredentials(): boolean {
    return this.original.username !== "" || this.original.password !== "";
  }

  get scheme(): string {
    return this.original.protocol.replace(/:$/, "");
  }

  get host(): string {
    return this.original.hostname;
  }

  /**
   * Resolve a path below the registry root, keeping credentials.
   */
  resolve(path: string): URL {
    return new URL(path, this.original);
  }

  toString(): string {
    return this.anonymous.toString();
  }

  toJSON(): string {
    return this.toString();
  }

  [INSPECT](): string {
    return `RegistryLocation <${this.toString()}>`;
  }
}
