/**
 * Zod schemas for request validation
 */

import { z } from 'zod';

export const rawCourseSchema = z.object({
  Name: z.string().trim().min(1),
  Credit: z.union([z.number(), z.string().min(1)]),
  Field: z.string().default(''),
  Format: z.string().default(''),
  Dates: z.string().min(1),
  Semester: z.string().optional(),
});

export const selectRequestSchema = z
  .object({
    targetCredits: z.number().int().positive().max(60),
    fields: z.array(z.string()).default([]),
    formats: z.array(z.string()).default([]),
    // "mon. 09:00-10:30; wed. 14:00-16:00" or one entry per element
    busySchedule: z.union([z.string(), z.array(z.string())]).default(''),
    semester: z.string().trim().min(1).optional(),
    courses: z.array(rawCourseSchema).optional(),
    seed: z.number().int().min(0).max(0xffffffff).optional(),
    maxSearchSteps: z.number().int().positive().optional(),
  })
  .refine(data => data.courses !== undefined || data.semester !== undefined, {
    message: 'Provide either an inline "courses" pool or a "semester" to look up',
    path: ['semester'],
  });

export const coursesQuerySchema = z.object({
  semester: z.string().trim().min(1).optional(),
  maxCredit: z.coerce.number().int().positive().optional(),
});

export type RawCourseInput = z.infer<typeof rawCourseSchema>;
export type SelectRequest = z.infer<typeof selectRequestSchema>;
export type CoursesQuery = z.infer<typeof coursesQuerySchema>;
