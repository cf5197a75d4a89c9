/**
 * Transport selection happens once, from the backend's transport spec
 */
import { config } from "../../config/index.js";
import { getToolSet } from "../../tools/index.js";
import type { BackendDescriptor } from "../../types/index.js";
import { HttpTransport } from "./HttpTransport.js";
import { InProcessTransport } from "./InProcessTransport.js";
import { StdioTransport } from "./StdioTransport.js";
import type { ToolTransport } from "./types.js";

export { HttpTransport } from "./HttpTransport.js";
export { InProcessTransport } from "./InProcessTransport.js";
export { StdioTransport } from "./StdioTransport.js";
export type { RequestOptions, ToolTransport } from "./types.js";

export type TransportFactory = (backend: BackendDescriptor) => ToolTransport;

export function createTransport(backend: BackendDescriptor): ToolTransport {
  const spec = backend.transport;
  switch (spec.type) {
    case "http":
      return new HttpTransport(spec, config.gateway.httpTimeoutMs);
    case "stdio":
      return new StdioTransport(spec, config.gateway.stdioTimeoutMs);
    case "in-process":
      return new InProcessTransport(spec.handler, getToolSet(spec.handler));
  }
}
