import { NextResponse } from 'next/server'
import { ZodError, z, type ZodType } from 'zod'
import { sanitizeBase } from './naming'
import {
  DEPLOYMENT_STATUSES,
  OPENAI_MODEL_NAMES,
  type Deployment,
  type DeploymentParameters,
  type DeploymentSummary,
  type ResourceNames,
} from '@/types'

export const MIN_RESOURCE_GROUP_LENGTH = 3
export const MAX_RESOURCE_GROUP_LENGTH = 15

export async function validateBody<T>(
  request: Request,
  schema: ZodType<T, z.ZodTypeDef, unknown>
): Promise<{ data: T } | { error: NextResponse }> {
  try {
    const body: unknown = await request.json()
    const data = schema.parse(body)
    return { data }
  } catch (err) {
    if (err instanceof ZodError) {
      const messages = err.issues.map((e: z.ZodIssue) => `${e.path.join('.')}: ${e.message}`)
      return {
        error: NextResponse.json(
          { error: 'Validation failed', details: messages },
          { status: 400 }
        ),
      }
    }
    return {
      error: NextResponse.json({ error: 'Invalid request body' }, { status: 400 }),
    }
  }
}

/** Form checkboxes arrive as "on"; JSON clients send booleans. */
const flag = z
  .union([z.boolean(), z.string()])
  .transform((v) => (typeof v === 'boolean' ? v : ['on', '1', 'true', 'yes'].includes(v.trim().toLowerCase())))

export const createDeploymentSchema = z
  .object({
    resource_group_base: z
      .string()
      .transform(sanitizeBase)
      .pipe(
        z
          .string()
          .min(MIN_RESOURCE_GROUP_LENGTH, 'Resource group base too short')
          .max(MAX_RESOURCE_GROUP_LENGTH, `Resource group base too long (max ${MAX_RESOURCE_GROUP_LENGTH})`)
      ),
    region: z.string().trim().min(1, 'Region is required').max(64),
    include_search: flag.default(false),
    openai_model_name: z.enum(OPENAI_MODEL_NAMES).default('gpt-4.1'),
    subscription_id: z.string().trim().max(64).optional(),
    service_principal_name: z.string().trim().min(1, 'Service principal name is required').max(120),
    secret_expiration_date: z
      .string()
      .trim()
      .regex(/^\d{4}-\d{2}-\d{2}(T[\d:.]+Z?)?$/, 'Secret expiration date must be an ISO date'),
  })
  .transform((body): DeploymentParameters => ({
    resourceGroupBase: body.resource_group_base,
    region: body.region,
    includeSearch: body.include_search,
    enableModelDeployment: true,
    openaiModelName: body.openai_model_name,
    // Empty version lets the platform pick the current one.
    openaiModelVersion: '',
    openaiDeploymentSku: 'GlobalStandard',
    modelDeploymentName: body.openai_model_name,
    servicePrincipalName: body.service_principal_name,
    secretExpirationDate: body.secret_expiration_date,
    ...(body.subscription_id ? { subscriptionId: body.subscription_id } : {}),
  }))

export type CreateDeploymentInput = z.input<typeof createDeploymentSchema>

const parametersSchema: ZodType<DeploymentParameters> = z.object({
  resourceGroupBase: z.string(),
  region: z.string(),
  includeSearch: z.boolean(),
  enableModelDeployment: z.boolean(),
  openaiModelName: z.enum(OPENAI_MODEL_NAMES),
  openaiModelVersion: z.string(),
  openaiDeploymentSku: z.string(),
  modelDeploymentName: z.string(),
  servicePrincipalName: z.string(),
  secretExpirationDate: z.string(),
  subscriptionId: z.string().optional(),
})

const resourceNamesSchema: ZodType<ResourceNames> = z.object({
  storageAccountName: z.string(),
  searchServiceName: z.string(),
  aiServicesName: z.string(),
  aiFoundryHubName: z.string(),
  appInsightsName: z.string(),
  logAnalyticsWorkspaceName: z.string(),
  projectName: z.string(),
  suffix: z.string(),
})

const statusSchema = z.enum(DEPLOYMENT_STATUSES)

export const deploymentRecordSchema: ZodType<Deployment> = z.object({
  id: z.string().min(1),
  status: statusSchema,
  parameters: parametersSchema,
  names: resourceNamesSchema,
  account: z
    .object({
      accountId: z.string(),
      strategy: z.enum(['explicit', 'env', 'single', 'default-flag', 'first']),
    })
    .nullable(),
  log: z.array(z.string()),
  outputs: z.record(z.union([z.string(), z.number(), z.boolean()])),
  createdAt: z.string(),
  updatedAt: z.string(),
  error: z.string().nullable(),
})

export const deploymentSummarySchema: ZodType<DeploymentSummary> = z.object({
  id: z.string(),
  name: z.string(),
  status: statusSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
  hasState: z.boolean(),
  outputsAvailable: z.boolean(),
  region: z.string(),
  includeSearch: z.boolean(),
  resourceNames: resourceNamesSchema,
})

export const deploymentIndexSchema = z.object({
  deployments: z.record(deploymentSummarySchema),
  metadata: z.object({
    version: z.string(),
    created: z.string(),
  }),
})

export type DeploymentIndex = z.infer<typeof deploymentIndexSchema>

/** Deployment ids are UUIDs; anything else never reaches the file system. */
export const deploymentIdSchema = z.string().uuid('Invalid deployment id')

/** Azure CLI `account list` entries; only the fields the selection policy reads. */
export const azureAccountSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  isDefault: z.boolean().optional(),
})

export type AzureAccount = z.infer<typeof azureAccountSchema>
