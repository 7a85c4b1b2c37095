/** Zod schemas for FlexReport GraphQL payloads and report definition files. */

import { z } from 'zod';

export const LoginDataSchema = z.object({
  loginAPI: z
    .object({
      accessToken: z.string().nullable().optional(),
    })
    .nullable()
    .optional(),
});

export const TriggerDataSchema = z.object({
  triggerFlexReportExecution: z.boolean().nullable().optional(),
});

const ReportResultSchema = z.object({
  status: z.string().nullable().optional(),
  reportUpdatedOn: z.union([z.string(), z.number()]).nullable().optional(),
  contents: z
    .array(
      z.object({
        preSignedUrl: z.string().nullable().optional(),
      })
    )
    .nullable()
    .optional(),
});

export const ReportNodeDataSchema = z.object({
  node: z
    .object({
      id: z.string().optional(),
      name: z.string().nullable().optional(),
      result: ReportResultSchema.nullable().optional(),
    })
    .nullable()
    .optional(),
});

export const CreateReportDataSchema = z.object({
  createFlexReport: z
    .object({
      id: z.string(),
      name: z.string(),
    })
    .nullable()
    .optional(),
});

const IntegerField = z.union([z.number(), z.string().regex(/^\s*-?\d+\s*$/)]).transform((value) => Number(value));

export const ReportDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  sqlStatement: z.string().min(1),
  dataGranularity: z.string().min(1),
  limit: IntegerField,
  timeRange: IntegerField,
  backlinking: z.boolean(),
  excludeCurrent: z.boolean(),
});

export const ReportDefinitionFileSchema = z.array(ReportDefinitionSchema);

export type ReportDefinitionInput = z.input<typeof ReportDefinitionSchema>;
