export { createServer } from "./app";
export { probeTool, probeTools } from "./probe";
export type { ToolStatus } from "./probe";
export { createService } from "./service";
export type { Service, ServiceOverrides } from "./service";
