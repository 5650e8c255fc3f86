import { z } from 'zod';

const EpochSecondsSchema = z.number().int().nonnegative();

export const StoredTodoSchema = z.object({
  title: z.string(),
  description: z.string().default(''),
  completed: z.boolean(),
  start_time: EpochSecondsSchema.nullable().default(null),
  end_time: EpochSecondsSchema.nullable().default(null),
  total_duration: EpochSecondsSchema.default(0),
});
export type StoredTodo = z.infer<typeof StoredTodoSchema>;

export const StoredProjectSchema = z.object({
  name: z.string(),
  todos: z.array(StoredTodoSchema),
});
export type StoredProject = z.infer<typeof StoredProjectSchema>;

export const StoredAppDataSchema = z.object({
  projects: z.array(StoredProjectSchema),
});
export type StoredAppData = z.infer<typeof StoredAppDataSchema>;
