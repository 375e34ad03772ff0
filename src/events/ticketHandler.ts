// src/events/ticketHandler.ts

import { randomUUID } from 'crypto';
import { HelpdeskContext } from '../context';
import { NotFoundError } from '../errors';
import { MaintenanceTicket, SpecialExamRequest } from '../models/Helpdesk';
import { recordAudit } from '../store/auditLog';
import { toIsoSeconds } from '../utils/time';

/**
 * Handle special exam arrangement request
 *
 * Always SUBMITTED; review happens outside this system.
 */
export async function handleSpecialExamRequest(
    context: HelpdeskContext,
    studentId: string,
    course: string,
    reason: string
): Promise<SpecialExamRequest> {
    const ticket: SpecialExamRequest = {
        id: randomUUID(),
        studentId,
        course,
        reason,
        status: 'submitted',
        created: toIsoSeconds(context.clock())
    };
    context.state.specialExamRequests.set(ticket.id, ticket);

    recordAudit(context.audit, context.logger, studentId, 'special_exam_request', { ticketId: ticket.id });
    await context.state.persist();

    return ticket;
}

/**
 * Handle hostel maintenance report
 *
 * @throws NotFoundError when the hostel does not exist
 */
export async function handleMaintenanceTicket(
    context: HelpdeskContext,
    studentId: string,
    hostelId: string,
    description: string
): Promise<MaintenanceTicket> {
    if (!context.state.hostels.has(hostelId)) {
        throw new NotFoundError(`hostel ${hostelId} not found`);
    }

    const ticket: MaintenanceTicket = {
        id: randomUUID(),
        studentId,
        hostelId,
        description,
        status: 'open',
        created: toIsoSeconds(context.clock())
    };
    context.state.maintenanceTickets.set(ticket.id, ticket);

    recordAudit(context.audit, context.logger, studentId, 'maintenance_ticket', { ticketId: ticket.id });
    await context.state.persist();

    return ticket;
}
