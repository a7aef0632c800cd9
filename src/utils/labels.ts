// Clients decorate categories, priorities and statuses for display
// ("🟢 Low - Minor issue"). Only the bare label is ever stored or compared.

export const REPORT_STATUSES = ["Pending", "In Progress", "Resolved"] as const;
export type ReportStatus = (typeof REPORT_STATUSES)[number];

export const PRIORITIES = ["Low", "Medium", "High", "Emergency"] as const;
export type Priority = (typeof PRIORITIES)[number];

/** Categories offered by the report form. Problem type stays free-form. */
export const PROBLEM_TYPES = [
    "Traffic",
    "Waste",
    "Water",
    "Power",
    "Road",
    "Environment",
    "Public Facility",
    "Emergency",
    "Other",
] as const;

const LEADING_DECORATION = /^[^\p{L}\p{N}]+/u;

function stripDecoration(raw: string): string {
    return raw.trim().replace(LEADING_DECORATION, "").trim();
}

export function canonicalProblemType(raw: string): string {
    const [label] = stripDecoration(raw).split(" - ");
    return label.replace(/\s+/g, " ").trim();
}

export function canonicalPriority(raw: string): Priority | undefined {
    const [word] = stripDecoration(raw).split(/[\s-]+/);
    const wanted = word.toLowerCase();
    return PRIORITIES.find((p) => p.toLowerCase() === wanted);
}

export function canonicalStatus(raw: string): ReportStatus | undefined {
    const wanted = stripDecoration(raw).replace(/[\s_-]+/g, " ").toLowerCase();
    return REPORT_STATUSES.find((s) => s.toLowerCase() === wanted);
}
