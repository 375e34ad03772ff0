// src/store/helpdeskState.ts

import { AuditEntry } from '../models/Audit';
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
} from '../models/Helpdesk';
import { Resource } from '../models/Resource';
import { Snapshot } from '../models/Snapshot';
import { Logger } from '../utils/logger';
import { PersistencePort } from './persistence';
import { loadSeedSnapshot } from './seed';

function refill<T>(target: Map<string, T>, source: Record<string, T>): void {
    target.clear();
    for (const [key, value] of Object.entries(source)) {
        target.set(key, value);
    }
}

/**
 * All in-memory helpdesk state
 *
 * Maps are never replaced, only refilled, so stores and sinks built over
 * them stay valid across a reload.
 */
export class HelpdeskState {
    readonly students = new Map<string, Student>();
    readonly courses = new Map<string, Resource>();
    readonly hostels = new Map<string, Resource>();
    readonly events = new Map<string, Resource>();
    readonly fees = new Map<string, FeeAccount>();
    readonly payments = new Map<string, Payment>();
    readonly examTimetables = new Map<string, ExamSitting[]>();
    readonly specialExamRequests = new Map<string, SpecialExamRequest>();
    readonly hostelBookings = new Map<string, HostelBooking>();
    readonly maintenanceTickets = new Map<string, MaintenanceTicket>();
    readonly leaveRequests = new Map<string, LeaveRequest>();
    readonly otps = new Map<string, OtpRecord>();
    readonly auditLogs: AuditEntry[] = [];

    private readonly persistence: PersistencePort;

    constructor(persistence: PersistencePort, snapshot?: Snapshot) {
        this.persistence = persistence;
        if (snapshot) {
            this.apply(snapshot);
        }
    }

    apply(snapshot: Snapshot): void {
        refill(this.students, snapshot.students);
        refill(this.courses, snapshot.courses);
        refill(this.hostels, snapshot.hostels);
        refill(this.events, snapshot.events);
        refill(this.fees, snapshot.fees);
        refill(this.payments, snapshot.payments);
        refill(this.examTimetables, snapshot.examTimetables);
        refill(this.specialExamRequests, snapshot.specialExamRequests);
        refill(this.hostelBookings, snapshot.hostelBookings);
        refill(this.maintenanceTickets, snapshot.maintenanceTickets);
        refill(this.leaveRequests, snapshot.leaveRequests);
        refill(this.otps, snapshot.otps);
        this.auditLogs.splice(0, this.auditLogs.length, ...snapshot.auditLogs);
    }

    toSnapshot(): Snapshot {
        return {
            students: Object.fromEntries(this.students),
            courses: Object.fromEntries(this.courses),
            hostels: Object.fromEntries(this.hostels),
            events: Object.fromEntries(this.events),
            fees: Object.fromEntries(this.fees),
            payments: Object.fromEntries(this.payments),
            examTimetables: Object.fromEntries(this.examTimetables),
            specialExamRequests: Object.fromEntries(this.specialExamRequests),
            hostelBookings: Object.fromEntries(this.hostelBookings),
            maintenanceTickets: Object.fromEntries(this.maintenanceTickets),
            leaveRequests: Object.fromEntries(this.leaveRequests),
            otps: Object.fromEntries(this.otps),
            auditLogs: [...this.auditLogs]
        };
    }

    /**
     * Write the current state through the persistence port
     */
    persist(): Promise<void> {
        return this.persistence.save(this.toSnapshot());
    }

    /**
     * Replace state with the persisted snapshot, or the seed when none exists
     *
     * An unreadable snapshot falls back to the seed.
     */
    async reload(logger: Logger, seed: () => Snapshot = loadSeedSnapshot): Promise<void> {
        let snapshot: Snapshot | undefined;
        try {
            snapshot = await this.persistence.load();
        } catch (err) {
            logger.warn('Persisted state unreadable, falling back to seed data', err);
        }

        this.apply(snapshot ?? seed());
    }
}
