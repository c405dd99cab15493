/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import type {
  FileSystem,
  HttpTransport,
  Logger,
  TransportRequest,
  TransportResponse,
} from "#/core";

interface MockFileEntry {
  content: string | Buffer;
  isDirectory: boolean;
}

/**
 * Create a mock FileSystem with in-memory storage
 */
export function createMockFileSystem(
  initialFiles: Record<string, string | Buffer> = {}
): FileSystem & { files: Map<string, MockFileEntry>; reads: string[] } {
  const files = new Map<string, MockFileEntry>();
  const reads: string[] = [];

  for (const [path, content] of Object.entries(initialFiles)) {
    files.set(path, { content, isDirectory: false });
  }

  const isDirectory = (path: string): boolean => {
    const normalizedPath = path.endsWith("/") ? path.slice(0, -1) : path;
    if (files.get(normalizedPath)?.isDirectory) return true;
    for (const filePath of files.keys()) {
      if (filePath.startsWith(normalizedPath + "/")) return true;
    }
    return false;
  };

  const entryFor = (path: string, op: string): MockFileEntry => {
    const entry = files.get(path);
    if (!entry || entry.isDirectory) {
      throw new Error(`ENOENT: no such file or directory, ${op} '${path}'`);
    }
    reads.push(path);
    return entry;
  };

  return {
    files,
    reads,

    readFile(path: string): string {
      const entry = entryFor(path, "open");
      return typeof entry.content === "string" ? entry.content : entry.content.toString("utf-8");
    },

    readFileBinary(path: string): Buffer {
      const entry = entryFor(path, "open");
      return typeof entry.content === "string" ? Buffer.from(entry.content) : entry.content;
    },

    exists(path: string): boolean {
      return files.has(path) || isDirectory(path);
    },

    readdir(path: string): string[] {
      const normalizedPath = path.endsWith("/") ? path.slice(0, -1) : path;
      const results: Set<string> = new Set();

      for (const filePath of files.keys()) {
        if (filePath.startsWith(normalizedPath + "/")) {
          const relativePath = filePath.slice(normalizedPath.length + 1);
          const firstPart = relativePath.split("/")[0];
          if (firstPart) {
            results.add(firstPart);
          }
        }
      }

      return Array.from(results).sort();
    },

    stat(path: string): { isDirectory: boolean; isFile: boolean; size: number } {
      const entry = files.get(path);
      if (!entry) {
        if (isDirectory(path)) {
          return { isDirectory: true, isFile: false, size: 0 };
        }
        throw new Error(`ENOENT: no such file or directory, stat '${path}'`);
      }
      if (entry.isDirectory) {
        return { isDirectory: true, isFile: false, size: 0 };
      }
      return { isDirectory: false, isFile: true, size: entry.content.length };
    },
  };
}

/**
 * A scripted reply: a response, a function computing one, or an error to throw.
 */
export type MockReply = TransportResponse | Error | ((req: TransportRequest) => TransportResponse);

/**
 * Create a mock HttpTransport with predefined replies keyed by URL.
 * A list of replies is consumed in order; its last entry repeats.
 * Unknown URLs answer 404.
 */
export function createMockTransport(
  routes: Record<string, MockReply | MockReply[]> = {}
): HttpTransport & { requests: TransportRequest[]; closed: boolean; urls(): string[] } {
  const requests: TransportRequest[] = [];
  const served = new Map<string, number>();

  const transport = {
    requests,
    closed: false,

    urls(): string[] {
      return requests.map((req) => req.url.toString());
    },

    async request(req: TransportRequest): Promise<TransportResponse> {
      requests.push(req);
      const key = req.url.toString();
      const route = routes[key];

      if (route === undefined) {
        return statusResponse(404, "Not Found");
      }

      let reply: MockReply | undefined;
      if (Array.isArray(route)) {
        const count = served.get(key) ?? 0;
        served.set(key, count + 1);
        reply = route[Math.min(count, route.length - 1)];
      } else {
        reply = route;
      }

      if (reply === undefined) {
        return statusResponse(404, "Not Found");
      }
      if (reply instanceof Error) {
        throw reply;
      }
      return typeof reply === "function" ? reply(req) : reply;
    },

    async close(): Promise<void> {
      transport.closed = true;
    },
  };

  return transport;
}

/**
 * Helper to create a successful response
 */
export function okResponse(body: Buffer | string = ""): TransportResponse {
  return { status: 200, headers: {}, body: typeof body === "string" ? Buffer.from(body) : body };
}

/**
 * Helper to create a response with any status
 */
export function statusResponse(status: number, body = ""): TransportResponse {
  return { status, headers: {}, body: Buffer.from(body) };
}

/**
 * Helper to create a redirect response
 */
export function redirectResponse(location: string, status = 302): TransportResponse {
  return { status, headers: { location }, body: Buffer.alloc(0) };
}

/**
 * Create a Logger that records every line
 */
export function createMockLogger(): Logger & { lines: string[]; traces: unknown[] } {
  const lines: string[] = [];
  const traces: unknown[] = [];
  return {
    lines,
    traces,
    debug: (message) => lines.push(`debug: ${message}`),
    info: (message) => lines.push(`info: ${message}`),
    warn: (message) => lines.push(`warn: ${message}`),
    trace: (error) => traces.push(error),
  };
}
