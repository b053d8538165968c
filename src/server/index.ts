export {
  createAppContext,
  closeAppContext,
  type AppContext,
  type AppContextOverrides,
} from "./context.js";
export { createMcpServer, startStdioServer, SERVER_NAME, SERVER_VERSION } from "./mcp.js";
export { registerWorkflowTools, resolveSessionId } from "./tools.js";
