/**
 * @entry Config 配置模块
 *
 * 加载 ~/.checkpulse.yaml、Schema 校验、环境变量覆盖
 */

export {
  loadConfig,
  getDefaultConfig,
  clearConfigCache,
  applyEnvOverrides,
  expandHome,
  BUNDLED_SCRIPTS_DIR,
} from './loadConfig.js'
export * from './schema.js'
