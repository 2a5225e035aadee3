/**
 * Checkfile 相关类型
 */

/** 一个 check 的定义，reload 时整体替换，不做原地修改 */
export interface CheckDefinition {
  readonly name: string
  readonly command: string
  /** 定义所在 checkfile 的路径（未解析软链接） */
  readonly sourcePath: string
  /** checkfile 真实路径所在目录，命令在这里执行 */
  readonly workingDirectory: string
  /** 最近一个 `#- 标题` 分隔符的标题；无标题分隔符或文件开头为 null */
  readonly section: string | null
  /** 1-based 行号 */
  readonly line: number
}

export interface CheckfileSection {
  readonly title: string | null
  readonly line: number
}

/** 无法解析的行：记录后跳过，不影响同文件其它 check */
export interface ParseDiagnostic {
  readonly path: string
  readonly line: number
  readonly text: string
  readonly message: string
}

export interface CheckfileSource {
  readonly path: string
  readonly realPath: string
  readonly hidden: boolean
}

export interface ParsedCheckfile {
  readonly path: string
  readonly realPath: string
  readonly checks: readonly CheckDefinition[]
  readonly sections: readonly CheckfileSection[]
  readonly diagnostics: readonly ParseDiagnostic[]
}
