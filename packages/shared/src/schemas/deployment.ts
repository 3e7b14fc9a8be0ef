import { z } from 'zod';
import {
  DEVICE_DEPLOYMENT_STATUSES,
  DEPLOYMENT_STATUSES,
  DEPLOYMENT_TYPES,
  STATUS_QUERIES,
} from '../types/deployment.js';

export const MAX_NAME_LENGTH = 4096;

export const DEFAULT_QUERY_LIMIT = 20;
export const MAX_QUERY_LIMIT = 500;

export const DeviceDeploymentStatusSchema = z.enum(DEVICE_DEPLOYMENT_STATUSES);
export const DeploymentStatusSchema = z.enum(DEPLOYMENT_STATUSES);
export const DeploymentTypeSchema = z.enum(DEPLOYMENT_TYPES);

const requiredName = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .min(1, 'is required')
  .max(MAX_NAME_LENGTH, `must be at most ${MAX_NAME_LENGTH} characters`);

export const DeploymentConstructorSchema = z.object({
  name: requiredName,
  artifactName: requiredName,
  devices: z
    .array(z.string({ invalid_type_error: 'must be a string' }).min(1, 'must not be empty'))
    .optional(),
  allDevices: z.boolean().optional(),
  group: z.string().optional(),
});

// Group targeting comes from the route, never from the request body
export const CreateDeploymentBodySchema = DeploymentConstructorSchema.omit({ group: true });

export const CreateConfigurationDeploymentBodySchema = z.object({
  name: requiredName,
  // Opaque payload, base64 encoded on the wire
  configuration: z.string().base64('must be base64 encoded'),
});

export const DeviceStatusTransitionSchema = z.object({
  from: DeviceDeploymentStatusSchema,
  to: DeviceDeploymentStatusSchema,
});

export const DeploymentQuerySchema = z
  .object({
    search: z.string().trim().optional(),
    type: DeploymentTypeSchema.optional(),
    status: z.enum(STATUS_QUERIES).default('any'),
    limit: z.coerce.number().int().min(1).max(MAX_QUERY_LIMIT).default(DEFAULT_QUERY_LIMIT),
    offset: z.coerce.number().int().min(0).default(0),
    createdAfter: z.coerce.date().optional(),
    createdBefore: z.coerce.date().optional(),
    sort: z.enum(['asc', 'desc']).default('desc'),
  })
  .transform(({ search, offset, ...rest }) => ({
    ...rest,
    searchText: search ? search : undefined,
    skip: offset,
  }));

export type DeploymentQueryInput = z.input<typeof DeploymentQuerySchema>;
