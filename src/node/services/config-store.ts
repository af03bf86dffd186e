import Conf, { type Schema } from 'conf'

import { DEFAULT_BAUD_RATE } from './link/serial'

/**
 * Persistent monitor configuration
 * Everything here can also be overridden from the command line
 */
export interface FlowMonitorConfig {
  /**
   * Last port the user connected to (used when no port is given)
   */
  serialPort?: string
  /**
   * Serial baud rate
   */
  baudRate: number
  /**
   * Silence tolerated before data is stale (ms)
   */
  staleTimeoutMs: number
  /**
   * Liveness poll period (ms)
   */
  readTimeoutMs: number
  /**
   * Moving average window (samples)
   */
  smoothingWindow: number
  /**
   * Series store capacity (points)
   */
  seriesCapacity: number
  /**
   * Fields required per frame (4 = time, flow, volume, status)
   */
  minFieldCount: number
  /**
   * Wait after opening the port before draining the banner (ms)
   */
  settleDelayMs: number
  /**
   * Maximum wait for the first bytes from the device (ms)
   */
  connectTimeoutMs: number
  /**
   * Flow rates above this are logged as suspicious (L/min)
   */
  highFlowWarningLpm: number
  /**
   * Default directory for CSV exports
   */
  exportDirectory?: string
}

export type FlowMonitorSettings = Readonly<FlowMonitorConfig>

export const DEFAULT_MONITOR_CONFIG: FlowMonitorSettings = Object.freeze({
  baudRate: DEFAULT_BAUD_RATE,
  staleTimeoutMs: 5000,
  readTimeoutMs: 1000,
  smoothingWindow: 10,
  seriesCapacity: 500,
  minFieldCount: 4,
  settleDelayMs: 2000,
  connectTimeoutMs: 10000,
  highFlowWarningLpm: 20,
})

const configSchema: Schema<FlowMonitorConfig> = {
  serialPort: { type: 'string' },
  baudRate: { type: 'integer', minimum: 300 },
  staleTimeoutMs: { type: 'integer', minimum: 1 },
  readTimeoutMs: { type: 'integer', minimum: 1 },
  smoothingWindow: { type: 'integer', minimum: 1 },
  seriesCapacity: { type: 'integer', minimum: 1 },
  minFieldCount: { type: 'integer', minimum: 3, maximum: 6 },
  settleDelayMs: { type: 'integer', minimum: 0 },
  connectTimeoutMs: { type: 'integer', minimum: 1 },
  highFlowWarningLpm: { type: 'number', exclusiveMinimum: 0 },
  exportDirectory: { type: 'string' },
}

/**
 * A stored or overridden setting is outside its allowed range.
 */
export class InvalidSettingError extends Error {
  /**
   * @param key
   * @param value
   * @param expected
   */
  constructor(
    readonly key: keyof FlowMonitorConfig,
    readonly value: unknown,
    expected: string
  ) {
    super(`Invalid value for ${key}: ${String(value)} (expected ${expected})`)
    this.name = 'InvalidSettingError'
  }
}

export interface ConfigStoreOptions {
  /**
   * Directory holding config.json (defaults to the per-user config directory)
   */
  cwd?: string
}

let storeInstance: Conf<FlowMonitorConfig> | null = null

/**
 * Create a config store. Tests pass a temporary directory; everything else uses the per-user default.
 * @param options
 */
export function createConfigStore(options: ConfigStoreOptions = {}): Conf<FlowMonitorConfig> {
  return new Conf<FlowMonitorConfig>({
    projectName: 'flow-telemetry-monitor',
    configName: 'config',
    cwd: options.cwd,
    schema: configSchema,
    defaults: { ...DEFAULT_MONITOR_CONFIG },
  })
}

/**
 * Get the shared config store instance (lazy initialization on first use).
 */
export function getConfigStore(): Conf<FlowMonitorConfig> {
  if (!storeInstance) {
    storeInstance = createConfigStore()
    console.log(`[Config] Using ${storeInstance.path}`)
  }
  return storeInstance
}

type NumericSettingKey = {
  [K in keyof FlowMonitorConfig]-?: FlowMonitorConfig[K] extends number ? K : never
}[keyof FlowMonitorConfig]

const integerMinimums: Partial<Record<NumericSettingKey, number>> = {
  baudRate: 300,
  staleTimeoutMs: 1,
  readTimeoutMs: 1,
  smoothingWindow: 1,
  seriesCapacity: 1,
  minFieldCount: 3,
  settleDelayMs: 0,
  connectTimeoutMs: 1,
}

/**
 * Check one numeric setting (stored values are schema-checked by conf; CLI overrides are not).
 * @param key
 * @param value
 */
export function validateSetting(key: NumericSettingKey, value: number): number {
  if (!Number.isFinite(value)) {
    throw new InvalidSettingError(key, value, 'a finite number')
  }

  if (key === 'highFlowWarningLpm') {
    if (value <= 0) {
      throw new InvalidSettingError(key, value, 'a positive number')
    }
    return value
  }

  const minimum = integerMinimums[key] ?? 0
  if (!Number.isInteger(value) || value < minimum) {
    throw new InvalidSettingError(key, value, `an integer >= ${minimum}`)
  }
  if (key === 'minFieldCount' && value > 6) {
    throw new InvalidSettingError(key, value, 'an integer between 3 and 6')
  }
  return value
}

/**
 * Merge stored configuration with overrides and validate the result.
 * @param overrides - Values from the command line; undefined entries are ignored
 * @param store - Config store to read (defaults to the shared instance)
 */
export function loadMonitorSettings(
  overrides: Partial<FlowMonitorConfig> = {},
  store: Conf<FlowMonitorConfig> = getConfigStore()
): FlowMonitorSettings {
  const merged: FlowMonitorConfig = { ...DEFAULT_MONITOR_CONFIG, ...store.store }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value })
    }
  }

  const numericKeys: NumericSettingKey[] = [
    'baudRate',
    'staleTimeoutMs',
    'readTimeoutMs',
    'smoothingWindow',
    'seriesCapacity',
    'minFieldCount',
    'settleDelayMs',
    'connectTimeoutMs',
    'highFlowWarningLpm',
  ]
  for (const key of numericKeys) {
    validateSetting(key, merged[key])
  }

  return Object.freeze(merged)
}

/**
 * Persist the last used port so the next run can connect without arguments.
 * @param port
 * @param store
 */
export function rememberPort(port: string, store: Conf<FlowMonitorConfig> = getConfigStore()): void {
  if (store.get('serialPort') === port) {
    return
  }
  store.set('serialPort', port)
  console.log(`[Config] Remembered serial port ${port}`)
}
