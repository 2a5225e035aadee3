/**
 * Jenkins tree 参数
 *
 * 字段规格是嵌套对象：true 表示叶子字段，对象表示带子字段的节点。
 * 序列化时方括号带反斜杠转义，URL 交给 curl 时不会被当作 glob。
 */

export interface FieldSpec {
  readonly [field: string]: true | FieldSpec
}

export const BUILD_FIELDS = {
  id: true,
  result: true,
  building: true,
  fullDisplayName: true,
  url: true,
  timestamp: true,
  duration: true,
  changeSet: {
    items: {
      msg: true,
      commitId: true,
      author: { fullName: true },
    },
  },
  actions: {
    lastBuiltRevision: { SHA1: true },
  },
} as const satisfies FieldSpec

export const JOB_FIELDS = {
  name: true,
  color: true,
  lastBuild: BUILD_FIELDS,
  lastSuccessfulBuild: BUILD_FIELDS,
} as const satisfies FieldSpec

/** {name: true, lastBuild: {id: true}} → "name,lastBuild\[id\]" */
export function buildTreeSelector(spec: FieldSpec): string {
  return Object.entries(spec)
    .map(([field, child]) => (child === true ? field : `${field}\\[${buildTreeSelector(child)}\\]`))
    .join(',')
}
