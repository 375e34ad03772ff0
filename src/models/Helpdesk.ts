// src/models/Helpdesk.ts

/**
 * Helpdesk records outside the registration engine
 *
 * Data only. Timestamps are ISO-8601 UTC strings with second precision.
 */

export interface Student {
    id: string;
    name: string;
    email: string;
}

export interface FeeItem {
    desc: string;
    amount: number;          // Negative for payments
}

export interface FeeAccount {
    balance: number;
    items: FeeItem[];
}

export type PaymentStatus = 'pending' | 'completed';

export interface Payment {
    id: string;
    studentId: string;
    amount: number;
    created: string;
    status: PaymentStatus;
    expiresAt: string;
    completedAt?: string;
}

export interface ExamSitting {
    date: string;
    time: string;
    venue: string;
}

export interface SpecialExamRequest {
    id: string;
    studentId: string;
    course: string;
    reason: string;
    status: 'submitted';
    created: string;
}

export interface HostelBooking {
    id: string;
    studentId: string;
    hostelId: string;
    created: string;
}

export interface MaintenanceTicket {
    id: string;
    studentId: string;
    hostelId: string;
    description: string;
    status: 'open';
    created: string;
}

export type LeaveStatus = 'approved' | 'pending';

export interface LeaveRequest {
    id: string;
    studentId: string;
    start: string;
    end: string;
    reason: string;
    leaveType?: string;
    status: LeaveStatus;
    durationDays: number;
    created: string;
}

export interface OtpRecord {
    code: string;
    expiresAt: string;
}
