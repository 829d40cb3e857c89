import { z } from 'zod';
import type {
  GradeTable,
  PortalSession,
  ProfileView,
  ResourceKind,
  ResourcePayloads,
  ScheduleView,
  SemesterList,
} from './portal.types';

/**
 * Schemas for values read back from the session store, hot cache and snapshots
 */

export const portalSessionSchema: z.ZodType<PortalSession> = z.object({
  sessionId: z.string().min(1),
  identity: z.string().min(1),
  cookies: z.record(z.string()),
  createdAt: z.number(),
  absoluteExpiresAt: z.number(),
  idleExpiresAt: z.number(),
});

const nullableText = z.string().nullable();

export const profileViewSchema: z.ZodType<ProfileView> = z.object({
  externalId: z.string(),
  accountName: z.string(),
  displayName: nullableText,
  orgUnit: nullableText,
  program: nullableText,
  cohortLabel: nullableText,
  enrollmentYear: nullableText,
  studyLevel: nullableText,
  fields: z.record(z.string()),
});

export const semesterListSchema: z.ZodType<SemesterList> = z.object({
  semesters: z.array(z.object({ value: z.string(), label: z.string() })),
  selected: z.string().nullable(),
});

export const gradeTableSchema: z.ZodType<GradeTable> = z.object({
  semester: z.string(),
  headers: z.array(z.string()),
  rows: z.array(z.record(z.string())),
});

export const scheduleViewSchema: z.ZodType<ScheduleView> = z.object({
  semester: z.string(),
  currentWeek: z.number().int().nullable(),
  courses: z.array(
    z.object({
      name: z.string(),
      teacher: z.string(),
      location: z.string(),
      weekday: z.number().int(),
      startSlot: z.number().int(),
      endSlot: z.number().int(),
      weekRange: z.string(),
      weeks: z.array(z.number().int()),
    })
  ),
});

export const payloadSchemas: { [K in ResourceKind]: z.ZodType<ResourcePayloads[K]> } = {
  profile: profileViewSchema,
  semesters: semesterListSchema,
  grades: gradeTableSchema,
  schedule: scheduleViewSchema,
};
