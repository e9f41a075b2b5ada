import { z } from 'zod';

export type ConditionStatus = 'True' | 'False' | 'Unknown';

// Severity only carries meaning for conditions with status False.
export type ConditionSeverity = 'Error' | 'Warning' | 'Info' | '';

export interface Condition {
  type: string;
  status: ConditionStatus;
  severity?: ConditionSeverity;
  // RFC 3339 at second resolution; absent or empty until the setter stamps it.
  lastTransitionTime?: string;
  reason?: string;
  message?: string;
}

export const conditionSchema = z.object({
  type: z.string(),
  status: z.enum(['True', 'False', 'Unknown']),
  severity: z.enum(['Error', 'Warning', 'Info', '']).optional(),
  // Serialized as null when unset.
  lastTransitionTime: z
    .string()
    .nullish()
    .transform((time) => time ?? undefined),
  reason: z.string().optional(),
  message: z.string().optional(),
});

export const conditionListSchema = z.array(conditionSchema);

