export {
  Display,
  stdoutDisplay,
  type DisplayOptions,
  renderBanner,
  logInfo,
  logWarning,
  logError,
  renderAlert,
  renderStats,
} from "./output.js";
export { formatBanner, RULE_WIDTH } from "./banner.js";
export { formatAlert, formatPortList, MAX_DISPLAY_PORTS } from "./alert.js";
export { formatLogLine } from "./log.js";
export { formatStats } from "./stats.js";
export { createTheme, themeFor, colorLevelFor, plainTheme, type Theme, type Style, type OutputStream } from "./theme.js";
