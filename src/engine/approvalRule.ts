// src/engine/approvalRule.ts

export type ApprovalDecision = 'approved' | 'pending';

/**
 * Auto-approval decision for leave-style requests
 *
 * Pure function - same input always produces same output
 *
 * Approved only when the request is short enough AND the caller's
 * condition holds; anything else waits for manual review.
 *
 * @param days Requested duration in whole days
 * @param qualifies Caller-specific condition (reason given, type allowed, ...)
 * @param threshold Longest duration that may be auto-approved
 */
export function decide(days: number, qualifies: boolean, threshold: number): ApprovalDecision {
    return days <= threshold && qualifies ? 'approved' : 'pending';
}
