import { z } from "zod";

export const todoSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  completed: z.boolean(),
});

export const todoListSchema = z.array(todoSchema);
