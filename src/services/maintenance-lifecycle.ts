import { MaintenanceStatus } from '../types/maintenance.type';

/**
 * Allowed status changes. COMPLETED is terminal.
 */
export const MAINTENANCE_TRANSITIONS: Record<MaintenanceStatus, readonly MaintenanceStatus[]> = {
    [MaintenanceStatus.OPEN]: [MaintenanceStatus.IN_PROGRESS, MaintenanceStatus.COMPLETED],
    [MaintenanceStatus.IN_PROGRESS]: [MaintenanceStatus.OPEN, MaintenanceStatus.COMPLETED],
    [MaintenanceStatus.COMPLETED]: [],
};

export function canTransition(from: MaintenanceStatus, to: MaintenanceStatus): boolean {
    return MAINTENANCE_TRANSITIONS[from].includes(to);
}
