/**
 * @module config-service
 *
 * 统一配置管理服务：集中管理所有环境变量配置。
 *
 * **设计目标**：
 * - 单一数据源：所有配置从 ConfigService 获取，避免散落的 process.env 访问
 * - 类型安全：提供强类型配置接口，在启动时校验配置有效性
 * - 可测试性：支持测试环境下重置配置
 *
 * **使用方式**：
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const config = ConfigService.getInstance();
 * console.log(config.pythonBin);
 * ```
 */

import { LogLevel } from '../utils/logger.js';

const DEFAULT_PYTHON_BIN = 'python3';
const DEFAULT_EXEC_TIMEOUT_MS = 5000;

/**
 * 配置服务单例类。
 *
 * 在首次调用 getInstance() 时初始化，从环境变量读取所有配置。
 * 配置项在实例生命周期内保持不变（只读）。
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 日志级别（默认 INFO） */
  readonly logLevel: LogLevel;

  /** 是否以 INFO 级别记录每次规则判定（NLCODE_TRACE=1 启用） */
  readonly traceMatches: boolean;

  /** 执行生成代码所用的 Python 解释器（默认 python3） */
  readonly pythonBin: string;

  /** 单次执行的超时时间，毫秒（默认 5000） */
  readonly execTimeoutMs: number;

  private constructor() {
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL);
    this.traceMatches = process.env.NLCODE_TRACE === '1';
    this.pythonBin = process.env.NLCODE_PYTHON || DEFAULT_PYTHON_BIN;
    this.execTimeoutMs = this.parseTimeout(process.env.NLCODE_EXEC_TIMEOUT_MS);
  }

  /**
   * 解析 LOG_LEVEL 环境变量为 LogLevel 枚举值。
   *
   * @param raw - 原始环境变量值
   * @returns 解析后的 LogLevel，默认 INFO
   */
  private parseLogLevel(raw: string | undefined): LogLevel {
    if (!raw) return LogLevel.INFO;
    switch (raw.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }

  /**
   * 解析超时配置；非正整数时回退到默认值。
   */
  private parseTimeout(raw: string | undefined): number {
    if (!raw || !/^\d+$/.test(raw)) return DEFAULT_EXEC_TIMEOUT_MS;
    const value = Number.parseInt(raw, 10);
    return value > 0 ? value : DEFAULT_EXEC_TIMEOUT_MS;
  }

  /**
   * 获取 ConfigService 单例实例。
   */
  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  /**
   * 重置单例实例（仅用于测试）。
   *
   * 重置后，下次调用 getInstance() 会重新读取环境变量。
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}
