import { z } from 'zod';

// Entity schemas name only what the archiver reads; everything else passes through.

export const OrganizationSchema = z
  .object({
    id: z.string(),
    name: z.string(),
  })
  .passthrough();

export const NetworkSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    productTypes: z.array(z.string()).default([]),
    tags: z.array(z.string()).optional(),
    configTemplateId: z.string().optional(),
  })
  .passthrough();

export const ConfigTemplateSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    productTypes: z.array(z.string()).default([]),
  })
  .passthrough();

export const DeviceSchema = z
  .object({
    serial: z.string(),
    model: z.string(),
    name: z.string().nullable().optional(),
    networkId: z.string().nullable().optional(),
  })
  .passthrough();

export type Organization = z.infer<typeof OrganizationSchema>;
export type Network = z.infer<typeof NetworkSchema>;
export type ConfigTemplate = z.infer<typeof ConfigTemplateSchema>;
export type Device = z.infer<typeof DeviceSchema>;

export const OpenApiParameterSchema = z
  .object({
    name: z.string(),
    in: z.string(),
    required: z.boolean().optional(),
  })
  .passthrough();

export const OpenApiOperationSchema = z
  .object({
    operationId: z.string(),
    tags: z.array(z.string()).default([]),
    description: z.string().optional(),
    summary: z.string().optional(),
    parameters: z.array(OpenApiParameterSchema).default([]),
  })
  .passthrough();

export const OpenApiDocumentSchema = z
  .object({
    paths: z.record(z.record(z.unknown())),
  })
  .passthrough();

export type OpenApiParameter = z.infer<typeof OpenApiParameterSchema>;
export type OpenApiOperation = z.infer<typeof OpenApiOperationSchema>;
export type OpenApiDocument = z.infer<typeof OpenApiDocumentSchema>;
