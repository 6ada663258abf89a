// Core type definitions for the nlcode rule engine

export interface Position {
  readonly line: number;
  readonly col: number;
}

export interface Span {
  readonly start: Position;
  readonly end: Position;
}

/**
 * 触发器捕获的片段。
 *
 * `start` 是片段在规范化指令中的 0 基偏移，用于在诊断中定位出错的列。
 */
export interface Capture {
  readonly text: string;
  readonly start: number;
}

/**
 * 帮助目录条目：由规则表派生，不单独维护。
 */
export interface CatalogEntry {
  /** 规则的稳定标识（如 `print-range`） */
  readonly id: string;
  /** 面向用户的指令模板（如 `print numbers from X to Y`） */
  readonly template: string;
  /** 一句话说明 */
  readonly description: string;
  /** 能被该规则接受的字面示例指令 */
  readonly example: string;
}

/**
 * 合成函数的只读上下文。
 *
 * 目前只携带帮助目录，供 `help` 规则渲染命令清单。
 */
export interface SynthesisContext {
  readonly catalog: readonly CatalogEntry[];
}

/**
 * 合成函数：把一次匹配的捕获渲染为代码文本。
 *
 * 必须是纯函数；捕获内容不合法时抛出 `SynthesisError`。
 */
export type Synthesizer = (captures: readonly Capture[], context: SynthesisContext) => string;

/**
 * 规则：触发器与合成函数的不可变组合，外加帮助目录所需的描述数据。
 */
export interface Rule extends CatalogEntry {
  /** 已锚定（整串匹配）的触发器 */
  readonly trigger: RegExp;
  readonly synthesize: Synthesizer;
}

/** 规则表：声明顺序即匹配优先级 */
export type RuleTable = readonly Rule[];

/**
 * 匹配结果：命中的规则及其位置捕获。生成后立即交给合成函数，不做保留。
 */
export interface RuleMatch {
  readonly rule: Rule;
  readonly captures: readonly Capture[];
}

/**
 * 一次翻译的结构化结果。
 *
 * `unrecognized` 与 `empty` 都是正常结果，不是错误。
 */
export type TranslationResult =
  | { readonly kind: 'code'; readonly ruleId: string; readonly code: string }
  | { readonly kind: 'unrecognized'; readonly code: string }
  | { readonly kind: 'empty'; readonly code: string };
