export { default as pipelinePlugin } from './pipeline-plugin.js';
export { default as opsRoutes } from './ops-routes.js';
export { buildOpsServer } from './server.js';
