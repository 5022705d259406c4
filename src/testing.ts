/**
 * Public test utilities for code built on streamkeeper: in-memory engine
 * sessions, a scriptable process manager and recording sockets.
 */
export { FakeSessionFactory, FakeSessionHandle } from "./testing/fake-session-handle.js";
export { type MockProcessHandle, MockProcessManager } from "./testing/mock-process-manager.js";
export { createMockSocket, type MockSocket } from "./testing/mock-socket.js";
