export type LogFormat = "gaia" | "cef";

export const LOG_FORMATS: LogFormat[] = ["gaia", "cef"];

export type FirewallAction = "drop" | "accept";

/** Returns a float in [0, 1), like `Math.random`. */
export type Random = () => number;

export function randomInt(min: number, max: number, random: Random): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function generateGaiaLog(
  sourceIp: string,
  dstPort: number,
  action: FirewallAction,
  random: Random
): string {
  const srcPort = randomInt(1024, 65535, random);
  const second = String(randomInt(0, 59, random)).padStart(2, "0");
  return (
    `Sep  3 15:12:${second} 192.168.99.1 ` +
    `Checkpoint: ${action} ${sourceIp} ` +
    `proto: tcp; service: ${dstPort}; s_port: ${srcPort}`
  );
}

export function generateCefLog(sourceIp: string, dstPort: number, action: FirewallAction): string {
  const severity = action === "drop" ? 5 : 3;
  const name = action === "drop" ? "Drop" : "Accept";
  return (
    `CEF:0|CheckPoint|VPN-1 & FireWall-1|R81.20|100|${name}|${severity}|` +
    `src=${sourceIp} dst=192.168.1.1 dpt=${dstPort} proto=TCP act=${action}`
  );
}

export function generateLog(
  format: LogFormat,
  sourceIp: string,
  dstPort: number,
  action: FirewallAction = "drop",
  random: Random = Math.random
): string {
  switch (format) {
    case "cef":
      return generateCefLog(sourceIp, dstPort, action);
    case "gaia":
      return generateGaiaLog(sourceIp, dstPort, action, random);
  }
}

/** Distinct ports in 1-65535, in draw order. */
export function samplePorts(count: number, random: Random = Math.random): number[] {
  const wanted = Math.min(count, 65535);
  const ports = new Set<number>();
  while (ports.size < wanted) {
    ports.add(randomInt(1, 65535, random));
  }
  return [...ports];
}
