import { z } from 'zod';

// ============================================================================
// Activity Schemas & Types
// ============================================================================

// Participants are compared as exact strings. No trimming or case folding,
// so "User@x.edu" and "user@x.edu" are two different registrants.
export const ParticipantEmailSchema = z.string().min(1);

export const ActivitySchema = z
  .object({
    description: z.string(),
    schedule: z.string(),
    max_participants: z.number().int().positive(),
    participants: z.array(ParticipantEmailSchema),
  })
  .refine((activity) => activity.participants.length <= activity.max_participants, {
    message: 'participants exceed max_participants',
    path: ['participants'],
  })
  .refine((activity) => new Set(activity.participants).size === activity.participants.length, {
    message: 'participants must be unique',
    path: ['participants'],
  });
export type Activity = z.infer<typeof ActivitySchema>;

export const ActivityCatalogSchema = z.record(z.string().min(1), ActivitySchema);
export type ActivityCatalog = z.infer<typeof ActivityCatalogSchema>;

export const SignupQuerySchema = z.object({
  email: ParticipantEmailSchema,
});
export type SignupQuery = z.infer<typeof SignupQuerySchema>;

export const ActivityParamsSchema = z.object({
  activityName: z.string().min(1),
});
export type ActivityParams = z.infer<typeof ActivityParamsSchema>;

export const ParticipantParamsSchema = ActivityParamsSchema.extend({
  email: ParticipantEmailSchema,
});
export type ParticipantParams = z.infer<typeof ParticipantParamsSchema>;

export interface ActivityMessageResponse {
  message: string;
}
