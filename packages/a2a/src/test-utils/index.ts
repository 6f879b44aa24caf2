export * from './fake-agent-server.js';
