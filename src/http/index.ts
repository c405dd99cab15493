/**
 * HTTP module
 *
 * Connections, single requests and redirect following.
 */

export { ConnectionManager, readCertificates, type ConnectionManagerOptions } from "./connection-manager";
export { UndiciTransport, toTransportFault } from "./undici-transport";
export { RequestExecutor, basicAuthorization, statusText, type RequestExecutorOptions } from "./request";
export { RedirectFollower, redirectTarget, type RedirectFollowerOptions } from "./redirect";
