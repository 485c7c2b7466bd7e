/**
 * Parsers for engine CLI output.
 *
 * Docker and Podman print slightly different JSON for the same command
 * (`Id` vs `ID`, labels as a map or as `k=v,k=v`, names as a string or an
 * array). These functions accept both and return null on anything they
 * cannot make sense of.
 */

import { LABEL_AGENT_ID, LABEL_AGENT_NAME, LABEL_USER_ID } from './constants.js';
import type {
  ContainerInfo,
  ContainerStats,
  ManagedContainerSummary,
  PortBinding,
} from './runtime.js';

// ---------------------------------------------------------------------------
// Narrowing helpers
// ---------------------------------------------------------------------------

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function firstString(record: JsonRecord, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = str(record[key]);
    if (value !== undefined) return value;
  }
  return undefined;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// Labels
// ---------------------------------------------------------------------------

/** Labels as a map (`inspect`, Podman `ps`) or `k=v,k=v` (Docker `ps`). */
export function parseLabels(value: unknown): Record<string, string> {
  const labels: Record<string, string> = {};
  if (isRecord(value)) {
    for (const [key, v] of Object.entries(value)) {
      if (typeof v === 'string') labels[key] = v;
    }
    return labels;
  }
  if (typeof value === 'string' && value !== '') {
    for (const pair of value.split(',')) {
      const eq = pair.indexOf('=');
      if (eq <= 0) continue;
      labels[pair.slice(0, eq)] = pair.slice(eq + 1);
    }
  }
  return labels;
}

// ---------------------------------------------------------------------------
// inspect
// ---------------------------------------------------------------------------

/** `NetworkSettings.Ports` map: `{"8000/tcp": [{HostIp, HostPort}] | null}`. */
function parsePortMap(value: unknown): PortBinding[] {
  if (!isRecord(value)) return [];
  const bindings: PortBinding[] = [];
  for (const [key, hosts] of Object.entries(value)) {
    const [portText, protocol = 'tcp'] = key.split('/');
    const containerPort = Number(portText);
    if (!Number.isInteger(containerPort) || !Array.isArray(hosts)) continue;
    for (const host of hosts) {
      if (!isRecord(host)) continue;
      const hostPort = Number(host['HostPort']);
      if (!Number.isInteger(hostPort) || hostPort <= 0) continue;
      bindings.push({
        containerPort,
        protocol,
        hostIp: str(host['HostIp']) ?? '',
        hostPort,
      });
    }
  }
  return bindings;
}

/**
 * Parse `inspect --format {{json .}}`. Accepts a bare object or the
 * one-element array `inspect` prints without `--format`.
 */
export function parseInspectOutput(stdout: string): ContainerInfo | null {
  let parsed = tryParseJson(stdout.trim());
  if (Array.isArray(parsed)) parsed = parsed[0];
  if (!isRecord(parsed)) return null;

  const id = firstString(parsed, 'Id', 'ID');
  if (id === undefined) return null;

  const state = isRecord(parsed['State']) ? parsed['State'] : {};
  const config = isRecord(parsed['Config']) ? parsed['Config'] : {};
  const network = isRecord(parsed['NetworkSettings']) ? parsed['NetworkSettings'] : {};

  const status = str(state['Status']) ?? 'unknown';
  const running = typeof state['Running'] === 'boolean' ? state['Running'] : status === 'running';

  return {
    id,
    name: (str(parsed['Name']) ?? '').replace(/^\//, ''),
    status,
    running,
    ports: parsePortMap(network['Ports']),
    labels: parseLabels(config['Labels']),
  };
}

// ---------------------------------------------------------------------------
// stats
// ---------------------------------------------------------------------------

const SIZE_UNITS: Record<string, number> = {
  b: 1,
  kb: 1e3,
  mb: 1e6,
  gb: 1e9,
  tb: 1e12,
  kib: 1024,
  mib: 1024 ** 2,
  gib: 1024 ** 3,
  tib: 1024 ** 4,
};

/** `"12.5MiB"` → 13107200, `"1.2kB"` → 1200. Null when unparseable. */
export function parseSize(text: string): number | null {
  const match = /^\s*([\d.]+)\s*([a-zA-Z]*)\s*$/.exec(text);
  if (!match) return null;
  const amount = Number(match[1]);
  const unit = SIZE_UNITS[(match[2] || 'b').toLowerCase()];
  if (!Number.isFinite(amount) || unit === undefined) return null;
  return Math.round(amount * unit);
}

/** `"0.41%"` → 0.41; `"--"` (no sample yet) → 0. */
export function parsePercent(text: string): number | null {
  const trimmed = text.trim();
  if (trimmed === '--' || trimmed === '') return 0;
  const value = Number(trimmed.replace(/%$/, ''));
  return Number.isFinite(value) ? value : null;
}

/** `"2.1MiB / 512MiB"` → [2202009, 536870912]. */
function parseSizePair(value: unknown): [number, number] | null {
  if (typeof value !== 'string') return null;
  const parts = value.split('/');
  if (parts.length !== 2) return null;
  const left = parseSize(parts[0]);
  const right = parseSize(parts[1]);
  if (left === null || right === null) return null;
  return [left, right];
}

/** Parse one `stats --no-stream --format {{json .}}` line. */
export function parseStatsOutput(stdout: string): ContainerStats | null {
  const firstLine = stdout.trim().split('\n')[0] ?? '';
  let parsed = tryParseJson(firstLine);
  if (Array.isArray(parsed)) parsed = parsed[0];
  if (!isRecord(parsed)) return null;

  const cpu = parsePercent(str(parsed['CPUPerc']) ?? '');
  const memPercent = parsePercent(str(parsed['MemPerc']) ?? '');
  const memory = parseSizePair(parsed['MemUsage']);
  const net = parseSizePair(parsed['NetIO']);
  const block = parseSizePair(parsed['BlockIO']);
  const pids = Number(parsed['PIDs'] ?? 0);

  if (cpu === null || memPercent === null || !memory || !net || !block) return null;

  return {
    cpuPercent: cpu,
    memoryUsageBytes: memory[0],
    memoryLimitBytes: memory[1],
    memoryPercent: memPercent,
    networkRxBytes: net[0],
    networkTxBytes: net[1],
    blockReadBytes: block[0],
    blockWriteBytes: block[1],
    pids: Number.isFinite(pids) ? pids : 0,
  };
}

// ---------------------------------------------------------------------------
// ps
// ---------------------------------------------------------------------------

/** Podman prints ports as objects; render them the way Docker does. */
function formatPorts(value: unknown): string {
  if (typeof value === 'string') return value;
  if (!Array.isArray(value)) return '';
  const rendered: string[] = [];
  for (const port of value) {
    if (!isRecord(port)) continue;
    const hostIp = str(port['host_ip']) || '0.0.0.0';
    const protocol = str(port['protocol']) ?? 'tcp';
    rendered.push(`${hostIp}:${String(port['host_port'])}->${String(port['container_port'])}/${protocol}`);
  }
  return rendered.join(', ');
}

function toSummary(row: unknown): ManagedContainerSummary | null {
  if (!isRecord(row)) return null;
  const id = firstString(row, 'ID', 'Id');
  if (id === undefined) return null;

  const labels = parseLabels(row['Labels']);
  const agentId = labels[LABEL_AGENT_ID];
  if (agentId === undefined) return null;

  const names = row['Names'];
  const name = Array.isArray(names) ? (str(names[0]) ?? '') : (str(names) ?? '');
  const createdAt = row['CreatedAt'] ?? row['Created'];

  return {
    id,
    name,
    status: firstString(row, 'State', 'Status') ?? 'unknown',
    agentId,
    agentName: labels[LABEL_AGENT_NAME] ?? null,
    userId: labels[LABEL_USER_ID] ?? null,
    createdAt:
      typeof createdAt === 'string'
        ? createdAt
        : typeof createdAt === 'number'
          ? new Date(createdAt * 1000).toISOString()
          : null,
    ports: formatPorts(row['Ports']),
  };
}

/**
 * Parse `ps -a --format {{json .}}`: newline-delimited objects (Docker) or
 * a JSON array (some Podman versions). Rows without the ownership label
 * are skipped. Returns null when a line is not JSON.
 */
export function parsePsOutput(stdout: string): ManagedContainerSummary[] | null {
  const trimmed = stdout.trim();
  if (trimmed === '') return [];

  let rows: unknown[];
  if (trimmed.startsWith('[')) {
    const parsed = tryParseJson(trimmed);
    if (!Array.isArray(parsed)) return null;
    rows = parsed;
  } else {
    rows = [];
    for (const line of trimmed.split('\n')) {
      if (line.trim() === '') continue;
      const parsed = tryParseJson(line);
      if (parsed === undefined) return null;
      rows.push(parsed);
    }
  }

  const summaries: ManagedContainerSummary[] = [];
  for (const row of rows) {
    const summary = toSummary(row);
    if (summary) summaries.push(summary);
  }
  return summaries;
}

/**
 * Host ports from `ps --format {{.Ports}}`, ascending and unique. Range
 * bindings (`0.0.0.0:9000-9002->8000-8002/tcp`) expand to every port.
 */
export function parsePortList(stdout: string): number[] {
  const ports = new Set<number>();
  for (const match of stdout.matchAll(/:(\d+)(?:-(\d+))?->/g)) {
    const first = Number(match[1]);
    const last = match[2] !== undefined ? Number(match[2]) : first;
    for (let port = first; port <= last; port++) {
      ports.add(port);
    }
  }
  return [...ports].sort((a, b) => a - b);
}
