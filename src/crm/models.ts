import { z } from "zod";

const dateRegex = /^\d{4}-\d{2}-\d{2}$/;
const timeRegex = /^\d{2}:\d{2}$/;

export const scheduleSchema = z.object({
  id: z.number().int(),
  group_id: z.number().int().nullish(),
  teacher_id: z.number().int().nullish(),
  hall_id: z.number().int().nullish(),
  date: z.string().regex(dateRegex, "date must be YYYY-MM-DD"),
  time: z.string().regex(timeRegex, "time must be HH:MM"),
  duration_minutes: z.number().int().nullish(),
  max_students: z.number().int().nullish(),
  current_students: z.number().int().nullish(),
  is_active: z.boolean().nullish()
});

export const groupSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  style_id: z.number().int().nullish(),
  teacher_id: z.number().int().nullish(),
  description: z.string().nullish(),
  is_active: z.boolean().nullish()
});

export const teacherSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  phone: z.string().nullish(),
  is_active: z.boolean().nullish()
});

export const clientSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  phone: z.string(),
  email: z.string().nullish(),
  informer_id: z.number().int().nullish()
});

export const reservationSchema = z.object({
  id: z.number().int(),
  client_id: z.number().int(),
  schedule_id: z.number().int(),
  status_id: z.number().int().nullish(),
  created_at: z.string().nullish(),
  notes: z.string().nullish()
});

export type Schedule = z.infer<typeof scheduleSchema>;
export type Group = z.infer<typeof groupSchema>;
export type Teacher = z.infer<typeof teacherSchema>;
export type Client = z.infer<typeof clientSchema>;
export type Reservation = z.infer<typeof reservationSchema>;

export interface ScheduleQuery {
  dateFrom?: string;
  dateTo?: string;
  groupId?: number;
}

export interface BookingQuery {
  clientId?: number;
  /** Exact day, YYYY-MM-DD. */
  date?: string;
}
