export enum MaintenanceIssueType {
    PLUMBING = 'plumbing',
    ELECTRICAL = 'electrical',
    HVAC = 'hvac',
    APPLIANCE = 'appliance',
    STRUCTURAL = 'structural',
    OTHER = 'other',
}

export enum MaintenancePriority {
    LOW = 'low',
    MEDIUM = 'medium',
    HIGH = 'high',
    URGENT = 'urgent',
}

export enum MaintenanceStatus {
    OPEN = 'open',
    IN_PROGRESS = 'in_progress',
    COMPLETED = 'completed',
}
