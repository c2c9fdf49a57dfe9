import { GlobalConfigSchema, type GlobalConfig } from './schema'

export const DEFAULT_GLOBAL_CONFIG: GlobalConfig = GlobalConfigSchema.parse({})
