export { ConnectionRegistry } from './connection-registry';
export type { ServerConnectionState, ToolLocation } from './connection-registry';
export { ToolInvoker } from './tool-invoker';
export type { ToolInvokerOptions } from './tool-invoker';
export type { ToolSession, SessionFactory } from './tool-session';
export { McpToolSession, mcpSessionFactory } from './mcp-session';
export { normalizeToolResult, coercePayload } from './tool-result';
export { ProgressStore } from './progress-store';
export type { RunEventType, RunOutcome } from './progress-store';
export { runFanOut } from './fan-out';
export { WorkflowEngine, CANCELLED_MESSAGE } from './workflow-engine';
export type { Pipeline, WorkflowEngineOptions } from './workflow-engine';
export { Poller } from './poller';
export type { PollerConfig, JobSource } from './poller';
export { WorkerHeartbeat } from './worker-heartbeat';
export type { HeartbeatTarget, WorkerHeartbeatOptions } from './worker-heartbeat';
export { QueueReaper } from './queue-reaper';
export type { AbandonedWork, WorkerDirectory, QueueReaperOptions } from './queue-reaper';
