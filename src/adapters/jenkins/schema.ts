/**
 * Jenkins JSON API 返回结构（只校验用到的字段，其余丢弃）
 */

import { z } from 'zod'

export const changeSetItemSchema = z.object({
  msg: z.string().default(''),
  commitId: z.string().nullish(),
  author: z.object({ fullName: z.string().nullish() }).nullish(),
})

// actions 里大部分条目是 {} 或只有 _class
export const buildActionSchema = z
  .object({
    lastBuiltRevision: z.object({ SHA1: z.string().nullish() }).nullish(),
  })
  .nullable()

export const buildSchema = z.object({
  id: z.string(),
  result: z.string().nullish(),
  building: z.boolean().default(false),
  fullDisplayName: z.string(),
  url: z.string(),
  timestamp: z.number(),
  duration: z.number(),
  changeSet: z.object({ items: z.array(changeSetItemSchema).default([]) }).nullish(),
  actions: z.array(buildActionSchema).default([]),
})

export const jobSchema = z.object({
  name: z.string(),
  color: z.string().default('notbuilt'),
  lastBuild: buildSchema.nullish(),
  lastSuccessfulBuild: buildSchema.nullish(),
})

// 根 API 里其它 job 的结构不影响结果，只在挑中之后按 jobSchema 校验
export const rootSchema = z.object({
  jobs: z.array(z.unknown()).default([]),
})

export const jobNameSchema = z.object({ name: z.string() })

export type ChangeSetItem = z.infer<typeof changeSetItemSchema>
export type JenkinsBuild = z.infer<typeof buildSchema>
export type JenkinsJob = z.infer<typeof jobSchema>
export type JenkinsRoot = z.infer<typeof rootSchema>
