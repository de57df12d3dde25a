// =====================================================
// Device Validation Schemas
// =====================================================
// All input validation happens at the boundary.

import { z } from 'zod';
import type {
  RegisterDeviceRequest,
  SyncStateRequest,
  UnregisterDeviceRequest,
  UpdateLiveActivityRequest,
} from '@activity-relay/shared-types';

// =====================================================
// Validation Helper
// =====================================================

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: z.ZodError['errors'];
}

export function validateInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
): ValidationResult<T> {
  const result = schema.safeParse(input);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: result.error.errors };
}

// =====================================================
// Shared Fields
// =====================================================

// APNs device tokens are 64 hex characters; anything under 32 is not a token
const deviceTokenSchema = z.string().trim().min(32, 'Invalid device token format');

const activityIdSchema = z.string().trim().min(1, 'Activity id is required');

const calendarEventSchema = z.object({
  title: z.string(),
  time: z.string(),
  startDate: z.string().optional(),
  attendees: z.string().optional(),
});

const emailSummarySchema = z.object({
  unreadCount: z.number().int().min(0),
  recentEmails: z
    .array(
      z.object({
        sender: z.string(),
        subject: z.string(),
        time: z.string(),
      }),
    )
    .default([]),
});

const weatherSchema = z.object({
  temp: z.number().optional(),
  condition: z.string().optional(),
  icon: z.string().optional(),
  sunrise: z.string().optional(),
  sunset: z.string().optional(),
  location: z.string().optional(),
});

// =====================================================
// Requests
// =====================================================

export const registerDeviceSchema: z.ZodType<RegisterDeviceRequest, z.ZodTypeDef, unknown> = z.object({
  deviceToken: deviceTokenSchema,
  activityId: activityIdSchema,
  liveActivityPushToken: deviceTokenSchema.optional(),
  googleCredentials: z
    .object({
      accessToken: z.string().min(1, 'Access token is required'),
      refreshToken: z.string().min(1).optional(),
    })
    .optional(),
});

export const unregisterDeviceSchema: z.ZodType<UnregisterDeviceRequest, z.ZodTypeDef, unknown> = z.object({
  deviceToken: deviceTokenSchema,
});

export const updateLiveActivitySchema: z.ZodType<UpdateLiveActivityRequest, z.ZodTypeDef, unknown> = z.object({
  deviceToken: deviceTokenSchema,
  activityId: activityIdSchema,
  contentState: z.record(z.unknown()),
});

export const syncStateSchema: z.ZodType<SyncStateRequest, z.ZodTypeDef, unknown> = z.object({
  deviceToken: deviceTokenSchema,
  calendarEvents: z.array(calendarEventSchema).max(50).optional(),
  emailSummary: emailSummarySchema.optional(),
  weather: weatherSchema.optional(),
  timezone: z.string().min(1).optional(),
});
