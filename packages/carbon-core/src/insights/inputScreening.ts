/** Keys whose value is not a finite number >= 0. */
export function findInvalidFields(entry: Readonly<Record<string, unknown>>): string[] {
    return Object.entries(entry)
        .filter(([, value]) => typeof value !== "number" || !Number.isFinite(value) || value < 0)
        .map(([key]) => key);
}

/** True when at least one value is a number > 0. */
export function hasMeaningfulInput(entry: Readonly<Record<string, unknown>>): boolean {
    return Object.values(entry).some((value) => typeof value === "number" && Number.isFinite(value) && value > 0);
}
