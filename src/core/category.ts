import type { RawFields } from "../types";

export const UNKNOWN_CATEGORY = "(unknown)";

const CATEGORY_FIELDS = ["_SYSTEMD_UNIT", "SYSLOG_IDENTIFIER"] as const;

/**
 * Sidebar grouping key: the systemd unit, else the syslog identifier.
 */
export function resolveCategory(fields: RawFields): string {
	for (const field of CATEGORY_FIELDS) {
		const value = fields[field];
		if (typeof value === "string" && value.trim() !== "") {
			return value.trim();
		}
	}
	return UNKNOWN_CATEGORY;
}
