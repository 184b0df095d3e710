export * from '@/lib/analytics'
export { CONFIG, DEFAULT_CONFIG, EngineConfigSchema, resolveConfig, type EngineConfig, type EngineConfigOverrides } from '@/lib/config'
export { APIError, ConfigError, StoreError, ValidationError, getErrorMessage } from '@/lib/utils/errors'
export { FREDClient, type FREDClientOptions } from '@/lib/api-clients/fred'
export { SnapshotStore, createRedisFromEnv, type KeyValueClient } from '@/lib/cache/redis'
