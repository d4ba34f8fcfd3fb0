export const INTERACTIVITY_LEVELS = ['silent', 'passive', 'interactive'] as const;

/**
 * How much user-facing UI an installer is allowed to show.
 * `interactive` is assumed to be supported by every installer.
 */
export type InteractivityLevel = typeof INTERACTIVITY_LEVELS[number];

export function isInteractivityLevel(value: string): value is InteractivityLevel {
    return INTERACTIVITY_LEVELS.some(level => level === value);
}
