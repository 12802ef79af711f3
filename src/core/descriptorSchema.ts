/**
 * Schema of the JSON descriptor set printed by `buf build --as-file-descriptor-set -o -#format=json`
 * Only the parts the wrappers read are described; other keys are stripped.
 */

import { z } from 'zod';

export const resourceDescriptorSchema = z.object({
  type: z.string(),
  pattern: z.array(z.string()).optional()
});

export const resourceReferenceSchema = z.object({
  type: z.string().optional(),
  childType: z.string().optional()
});

export const fieldDescriptorSchema = z.object({
  name: z.string(),
  number: z.number().int(),
  label: z.string().optional(),
  type: z.string().optional(),
  typeName: z.string().optional(),
  oneofIndex: z.number().int().optional(),
  proto3Optional: z.boolean().optional(),
  options: z.object({
    '[google.api.resource_reference]': resourceReferenceSchema.optional(),
    '[google.api.field_behavior]': z.array(z.string()).optional()
  }).optional()
});

export const enumDescriptorSchema = z.object({
  name: z.string(),
  value: z.array(z.object({
    name: z.string(),
    number: z.number().int()
  })).optional()
});

export type ResourceDescriptorJson = z.infer<typeof resourceDescriptorSchema>;
export type FieldDescriptorJson = z.infer<typeof fieldDescriptorSchema>;
export type EnumDescriptorJson = z.infer<typeof enumDescriptorSchema>;

export interface DescriptorJson {
  name: string;
  field?: FieldDescriptorJson[];
  nestedType?: DescriptorJson[];
  enumType?: EnumDescriptorJson[];
  oneofDecl?: { name: string }[];
  options?: {
    mapEntry?: boolean;
    '[google.api.resource]'?: ResourceDescriptorJson;
  };
}

export const descriptorSchema: z.ZodType<DescriptorJson> = z.lazy(() =>
  z.object({
    name: z.string(),
    field: z.array(fieldDescriptorSchema).optional(),
    nestedType: z.array(descriptorSchema).optional(),
    enumType: z.array(enumDescriptorSchema).optional(),
    oneofDecl: z.array(z.object({ name: z.string() })).optional(),
    options: z.object({
      mapEntry: z.boolean().optional(),
      '[google.api.resource]': resourceDescriptorSchema.optional()
    }).optional()
  })
);

export const fileDescriptorSchema = z.object({
  name: z.string(),
  package: z.string().optional(),
  messageType: z.array(descriptorSchema).optional(),
  enumType: z.array(enumDescriptorSchema).optional(),
  options: z.object({
    '[google.api.resource_definition]': z.array(resourceDescriptorSchema).optional()
  }).optional(),
  sourceCodeInfo: z.object({
    location: z.array(z.object({
      path: z.array(z.number().int()).optional(),
      span: z.array(z.number().int()).optional()
    })).optional()
  }).optional()
});

export const fileDescriptorSetSchema = z.object({
  file: z.array(fileDescriptorSchema).optional()
});

export type FileDescriptorJson = z.infer<typeof fileDescriptorSchema>;
export type FileDescriptorSetJson = z.infer<typeof fileDescriptorSetSchema>;
