import { z } from "zod";

export const registerSchema = z.object({
  username: z.string().trim().min(1).max(150),
  email: z.string().email().max(254),
  password: z.string().min(1).max(128),
  confirmation: z.string().max(128),
  address: z.string().max(255).optional(),
  phoneNumber: z.string().max(20).optional(),
});

export const loginSchema = z.object({
  username: z.string().trim().min(1).max(150),
  password: z.string().min(1).max(128),
});

export type RegisterBody = z.infer<typeof registerSchema>;
export type LoginBody = z.infer<typeof loginSchema>;
