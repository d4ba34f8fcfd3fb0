export type InitializationEvent = {
    type: 'initialization';
    packageId: string;
}

export type ExecutingEvent = {
    type: 'executing';
    packageId: string;
}

export type SuccessEvent = {
    type: 'success';
    packageId: string;
}

/**
 * Lifecycle notifications published during an operation
 */
export type LifecycleEvent = InitializationEvent | ExecutingEvent | SuccessEvent;
