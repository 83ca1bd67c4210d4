export {
  generateLog,
  generateGaiaLog,
  generateCefLog,
  samplePorts,
  LOG_FORMATS,
  type LogFormat,
  type FirewallAction,
  type Random,
} from "./logs.js";
export { UdpTransport, type Transport, type SimulationTarget } from "./transport.js";
export {
  simulateScan,
  simulateNormal,
  replayFile,
  estimateDurationMs,
  COMMON_PORTS,
  type ProgressReporter,
  type SimulationDeps,
  type ScanSimulation,
  type NormalSimulation,
  type ReplaySimulation,
  type SimulationReport,
  type NormalReport,
} from "./runner.js";
