import { DocumentStatus } from '../database/models';
import { InvalidTransitionError } from '../database/tracking.errors';

/**
 * Forward-only status progression for tracked documents.
 *
 * - QUEUED → RUNNING | COMPLETED | FAILED | ABORTED
 * - RUNNING → COMPLETED | FAILED | ABORTED
 * - COMPLETED, FAILED, ABORTED are terminal
 *
 * A status never follows itself; callers decide what a repeat means.
 */
export class DocumentStatusMachine {
    private static readonly VALID_TRANSITIONS: Map<DocumentStatus, DocumentStatus[]> = new Map<DocumentStatus, DocumentStatus[]>([
        [
            DocumentStatus.QUEUED,
            [DocumentStatus.RUNNING, DocumentStatus.COMPLETED, DocumentStatus.FAILED, DocumentStatus.ABORTED],
        ],
        [DocumentStatus.RUNNING, [DocumentStatus.COMPLETED, DocumentStatus.FAILED, DocumentStatus.ABORTED]],
        [DocumentStatus.COMPLETED, []],
        [DocumentStatus.FAILED, []],
        [DocumentStatus.ABORTED, []],
    ]);

    static isValidTransition(fromStatus: DocumentStatus, toStatus: DocumentStatus): boolean {
        return this.VALID_TRANSITIONS.get(fromStatus)?.includes(toStatus) ?? false;
    }

    /**
     * @throws InvalidTransitionError if the target does not follow the current status
     */
    static validateTransition(fromStatus: DocumentStatus, toStatus: DocumentStatus): void {
        if (!this.isValidTransition(fromStatus, toStatus)) {
            throw new InvalidTransitionError(fromStatus, toStatus);
        }
    }
}
