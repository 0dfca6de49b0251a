export { createHttpServer, buildHealthReport, type HttpServerDeps, type HealthReport } from './server.js';
