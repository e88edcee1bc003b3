/**
 * @license MIT
 * @copyright Copyright (c) 2025, GoldFrite
 */

import { z } from 'zod'
import type { MicrosoftToken, MinecraftProfile, XboxLiveAuthResponse } from '../../types/auth'

/**
 * Unknown fields are kept: the token is persisted as the identity provider returned it.
 */
export const microsoftTokenSchema: z.ZodType<MicrosoftToken, z.ZodTypeDef, unknown> = z
  .object({
    access_token: z.string().min(1),
    refresh_token: z.string().min(1),
    expires_in: z.number(),
    token_type: z.string().optional(),
    scope: z.string().optional(),
    user_id: z.string().optional()
  })
  .passthrough()

export const xboxLiveAuthSchema: z.ZodType<XboxLiveAuthResponse, z.ZodTypeDef, unknown> = z
  .object({
    IssueInstant: z.string().optional(),
    NotAfter: z.string().optional(),
    Token: z.string().min(1),
    DisplayClaims: z.object({
      xui: z.array(z.object({ uhs: z.string().min(1) })).min(1)
    })
  })
  .transform((res) => ({
    token: res.Token,
    displayClaims: { xui: res.DisplayClaims.xui.map((claim) => ({ uhs: claim.uhs })) },
    issueInstant: res.IssueInstant,
    notAfter: res.NotAfter
  }))

export const xstsSchema = z.object({ Token: z.string().min(1) })

export const xstsErrorSchema = z.object({ XErr: z.number(), Message: z.string().optional() })

export const minecraftLoginSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
  username: z.string().optional()
})

export const minecraftProfileSchema: z.ZodType<MinecraftProfile, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  name: z.string(),
  skins: z.array(z.object({ id: z.string(), state: z.string(), url: z.string(), variant: z.string().optional() })).optional(),
  capes: z.array(z.object({ id: z.string(), state: z.string(), url: z.string(), alias: z.string().optional() })).optional()
})

export const entitlementsSchema = z.object({
  items: z.array(z.object({ name: z.string() }))
})
