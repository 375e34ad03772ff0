// src/models/Snapshot.ts

import { AuditEntry } from './Audit';
import {
    ExamSitting,
    FeeAccount,
    HostelBooking,
    LeaveRequest,
    MaintenanceTicket,
    OtpRecord,
    Payment,
    SpecialExamRequest,
    Student
} from './Helpdesk';
import { Resource } from './Resource';

/**
 * Whole helpdesk state as written to / read from persistence
 */
export interface Snapshot {
    students: Record<string, Student>;
    courses: Record<string, Resource>;
    hostels: Record<string, Resource>;
    events: Record<string, Resource>;
    fees: Record<string, FeeAccount>;
    payments: Record<string, Payment>;
    examTimetables: Record<string, ExamSitting[]>;
    specialExamRequests: Record<string, SpecialExamRequest>;
    hostelBookings: Record<string, HostelBooking>;
    maintenanceTickets: Record<string, MaintenanceTicket>;
    leaveRequests: Record<string, LeaveRequest>;
    otps: Record<string, OtpRecord>;
    auditLogs: AuditEntry[];
}
