/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import { z } from 'zod'

export const modSchema = z.object({
  name: z.string(),
  fileName: z.string(),
  version: z.string().optional(),
  url: z.string().optional(),
  sha1: z.string().optional(),
  source: z.enum(['MODRINTH', 'CURSEFORGE', 'LOCAL'])
})

/**
 * Shape of `instance.json`. `path` is not trusted: it is replaced by the folder the file is read from.
 */
export const instanceFileSchema = z.object({
  id: z.string().uuid(),
  name: z.string().min(1),
  description: z.string().default(''),
  minecraftVersion: z.string(),
  loader: z.object({
    type: z.enum(['VANILLA', 'FABRIC', 'FORGE', 'NEOFORGE', 'QUILT']),
    version: z.string()
  }),
  javaPath: z.string().default(''),
  window: z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    fullscreen: z.boolean().default(false)
  }),
  ram: z.object({
    minimumMB: z.number().int().positive(),
    maximumMB: z.number().int().positive()
  }),
  mods: z.array(modSchema).default([]),
  path: z.string().optional(),
  lastModified: z.number()
})

export type InstanceFile = z.infer<typeof instanceFileSchema>
