// src/store/snapshotSchema.ts

import { z } from 'zod';
import { Snapshot } from '../models/Snapshot';

const waitlistEntrySchema = z.object({
    studentId: z.string(),
    requestedAt: z.string()
});

const resourceSchema = z.object({
    id: z.string(),
    title: z.string(),
    capacity: z.number().int().nonnegative(),
    holders: z.array(z.string()).default([]),
    waitlist: z.array(waitlistEntrySchema).default([])
});

const studentSchema = z.object({
    id: z.string(),
    name: z.string(),
    email: z.string()
});

const feeAccountSchema = z.object({
    balance: z.number(),
    items: z.array(z.object({ desc: z.string(), amount: z.number() })).default([])
});

const paymentSchema = z.object({
    id: z.string(),
    studentId: z.string(),
    amount: z.number(),
    created: z.string(),
    status: z.enum(['pending', 'completed']),
    expiresAt: z.string(),
    completedAt: z.string().optional()
});

const examSittingSchema = z.object({
    date: z.string(),
    time: z.string(),
    venue: z.string()
});

const specialExamRequestSchema = z.object({
    id: z.string(),
    studentId: z.string(),
    course: z.string(),
    reason: z.string(),
    status: z.literal('submitted'),
    created: z.string()
});

const hostelBookingSchema = z.object({
    id: z.string(),
    studentId: z.string(),
    hostelId: z.string(),
    created: z.string()
});

const maintenanceTicketSchema = z.object({
    id: z.string(),
    studentId: z.string(),
    hostelId: z.string(),
    description: z.string(),
    status: z.literal('open'),
    created: z.string()
});

const leaveRequestSchema = z.object({
    id: z.string(),
    studentId: z.string(),
    start: z.string(),
    end: z.string(),
    reason: z.string(),
    leaveType: z.string().optional(),
    status: z.enum(['approved', 'pending']),
    durationDays: z.number().int(),
    created: z.string()
});

const auditEntrySchema = z.object({
    id: z.string(),
    timestamp: z.string(),
    actor: z.string(),
    action: z.string(),
    details: z.record(z.unknown()).default({})
});

const snapshotSchema = z.object({
    students: z.record(studentSchema).default({}),
    courses: z.record(resourceSchema).default({}),
    hostels: z.record(resourceSchema).default({}),
    events: z.record(resourceSchema).default({}),
    fees: z.record(feeAccountSchema).default({}),
    payments: z.record(paymentSchema).default({}),
    examTimetables: z.record(z.array(examSittingSchema)).default({}),
    specialExamRequests: z.record(specialExamRequestSchema).default({}),
    hostelBookings: z.record(hostelBookingSchema).default({}),
    maintenanceTickets: z.record(maintenanceTicketSchema).default({}),
    leaveRequests: z.record(leaveRequestSchema).default({}),
    otps: z.record(z.object({ code: z.string(), expiresAt: z.string() })).default({}),
    auditLogs: z.array(auditEntrySchema).default([])
});

/**
 * Validate raw JSON into a full snapshot; absent collections become empty
 *
 * Throws ZodError on malformed input.
 */
export function parseSnapshot(raw: unknown): Snapshot {
    return snapshotSchema.parse(raw);
}
