import { z } from 'zod';

/** Request body schema for registering an account. */
export const RegisterBodySchema = z.object({
    username: z.string().min(3).max(50).regex(/^[A-Za-z0-9_.-]+$/),
    email: z.string().email().max(254),
    password: z.string().min(8).max(128),
    confirmPassword: z.string().min(1).max(128),
});

export type RegisterBody = z.infer<typeof RegisterBodySchema>;

export const LoginBodySchema = z.object({
    username: z.string().min(1).max(50),
    password: z.string().min(1).max(128),
});

export type LoginBody = z.infer<typeof LoginBodySchema>;

/** Claims carried by an access token; `sub` is the username. */
export interface TokenClaims {
    sub: string;
}

export interface LoginResponse {
    accessToken: string;
    tokenType: 'bearer';
}

export interface WhoamiResponse {
    username: string;
    email: string;
}
