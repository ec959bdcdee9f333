import { z } from "zod";

export const ZRegisterSchema = z
  .object({
    username: z
      .string({ required_error: "Username is required" })
      .trim()
      .min(1, "Username is required")
      .min(3, "Username must be at least 3 characters")
      .max(150),
    email: z.string().trim().email().or(z.literal("")).default(""),
    fullName: z.string().trim().max(100).optional(),
    password: z
      .string({ required_error: "Password is required" })
      .min(1, "Password is required")
      .min(6, "Password must be at least 6 characters"),
    confirmPassword: z.string().default(""),
  })
  .refine((data) => data.password === data.confirmPassword, {
    message: "Passwords do not match",
    path: ["confirmPassword"],
  });

export const ZLoginSchema = z.object({
  username: z.string().trim().min(1, "Username and password are required"),
  password: z.string().min(1, "Username and password are required"),
});

export type RegisterRequest = z.infer<typeof ZRegisterSchema>;
export type LoginRequest = z.infer<typeof ZLoginSchema>;
