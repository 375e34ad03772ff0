// src/config.ts

import { z } from 'zod';
import { LogLevel } from './utils/logger';

export interface LeavePolicy {
    reasonThresholdDays: number;       // Leave with a reason
    typeThresholdDays: number;         // Leave with a leave_type
    restrictedTypes: readonly string[]; // Types that always need review
}

export interface AppConfig {
    port: number;
    persist: boolean;
    dataFile: string;
    paymentLinkBase: string;
    paymentTtlMinutes: number;
    otpTtlMinutes: number;
    leavePolicy: LeavePolicy;
    logLevel: LogLevel;
}

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(5000),
    PERSIST: z.enum(['true', 'false']).default('false'),
    DATA_FILE: z.string().min(1).default('data_store.json'),
    PAYMENT_LINK_BASE: z.string().url().default('https://payments.example/university/pay'),
    PAYMENT_TTL_MINUTES: z.coerce.number().int().positive().default(60),
    OTP_TTL_MINUTES: z.coerce.number().int().positive().default(5),
    LEAVE_REASON_THRESHOLD_DAYS: z.coerce.number().int().nonnegative().default(3),
    LEAVE_TYPE_THRESHOLD_DAYS: z.coerce.number().int().nonnegative().default(2),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')
});

/**
 * Build config from environment variables
 *
 * Throws when a variable is present but invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid environment configuration - ${problems}`);
    }

    const vars = parsed.data;
    return {
        port: vars.PORT,
        persist: vars.PERSIST === 'true',
        dataFile: vars.DATA_FILE,
        paymentLinkBase: vars.PAYMENT_LINK_BASE.replace(/\/+$/, ''),
        paymentTtlMinutes: vars.PAYMENT_TTL_MINUTES,
        otpTtlMinutes: vars.OTP_TTL_MINUTES,
        leavePolicy: {
            reasonThresholdDays: vars.LEAVE_REASON_THRESHOLD_DAYS,
            typeThresholdDays: vars.LEAVE_TYPE_THRESHOLD_DAYS,
            restrictedTypes: ['maternity', 'medical']
        },
        logLevel: vars.LOG_LEVEL
    };
}
