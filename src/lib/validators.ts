import { z } from "zod";
import type { FieldErrors } from "./errors.js";
import { EVENT_CATEGORIES, isEventCategory, isEventStatus } from "../types/event.js";
import { ROLES, isRole } from "../types/profile.js";
import { MAX_MESSAGE_LENGTH } from "../types/message.js";
import { MEMBER_ROLES, isMemberRole } from "../types/group.js";

export type Check = { ok: true } | { ok: false; message: string };

const OK: Check = { ok: true };

function fail(message: string): Check {
    return { ok: false, message };
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
// date, optionally followed by a time and a UTC offset
const ISO_DATE_TIME_PATTERN = /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}(:?\d{2})?)?)?$/i;
const emailSchema = z.string().email();

export const MAX_CAPACITY = 1_000_000;

/** Length in characters (code points), so an emoji counts once. */
export function charLength(value: string): number {
    return [...value].length;
}

function isBlank(value: unknown): boolean {
    return value === undefined || value === null || String(value).trim() === "";
}

export function validateEmail(email: unknown): Check {
    if (typeof email !== "string" || email.trim() === "") return fail("Email is required");
    if (!emailSchema.safeParse(email.trim()).success) return fail("Invalid email address");
    return OK;
}

export function validatePassword(password: unknown): Check {
    if (typeof password !== "string" || password === "") return fail("Password is required");
    if (password.length < 8) return fail("Password must be at least 8 characters long");
    if (!/[a-zA-Z]/.test(password)) return fail("Password must contain at least one letter");
    if (!/\d/.test(password)) return fail("Password must contain at least one number");
    return OK;
}

export function validateName(name: unknown): Check {
    if (typeof name !== "string" || name.trim() === "") return fail("Name is required");
    const length = charLength(name.trim());
    if (length < 2) return fail("Name must be at least 2 characters long");
    if (length > 100) return fail("Name must not exceed 100 characters");
    return OK;
}

/** Expects the caller to have trimmed and lower-cased the value. */
export function validateRole(role: unknown): Check {
    if (typeof role !== "string" || role === "") return fail("Role is required");
    if (!isRole(role)) return fail(`Role must be one of: ${ROLES.join(", ")}`);
    return OK;
}

/** Group membership role; same normalization contract as validateRole. */
export function validateMemberRole(role: unknown): Check {
    if (typeof role !== "string" || role === "") return fail("Role is required");
    if (!isMemberRole(role)) return fail(`Role must be one of: ${MEMBER_ROLES.join(", ")}`);
    return OK;
}

export function validateUuid(value: unknown): Check {
    if (typeof value !== "string" || value === "") return fail("UUID is required");
    if (!UUID_PATTERN.test(value)) return fail("Invalid UUID format");
    return OK;
}

export function validatePhone(phone: unknown): Check {
    if (typeof phone !== "string" || phone.trim() === "") return fail("Phone number is required");
    const digits = phone.replace(/[\s\-()+]/g, "");
    if (!/^\d+$/.test(digits)) return fail("Phone number must contain only digits");
    if (digits.length < 10 || digits.length > 15) return fail("Phone number must be between 10 and 15 digits");
    return OK;
}

/** "end_datetime" -> "End Datetime" */
export function humanize(field: string): string {
    return field
        .replace(/_/g, " ")
        .toLowerCase()
        .replace(/\b[a-z]/g, (c) => c.toUpperCase());
}

export function validateRequiredFields(data: Record<string, unknown>, fields: readonly string[]): FieldErrors {
    const errors: FieldErrors = {};
    for (const field of fields) {
        if (isBlank(data[field])) errors[field] = `${humanize(field)} is required`;
    }
    return errors;
}

export function isHttpUrl(value: string): boolean {
    return value.startsWith("http://") || value.startsWith("https://");
}

export function isDateTime(value: unknown): value is string {
    return typeof value === "string" && ISO_DATE_TIME_PATTERN.test(value) && !Number.isNaN(Date.parse(value));
}

/** Normalizes any accepted date-time to a UTC ISO string so stored values sort lexically. */
export function toIsoDateTime(value: string): string {
    return new Date(value).toISOString();
}

/** Integer or integer-looking string; anything else is null. */
export function parseCapacity(value: unknown): number | null {
    if (typeof value === "number") return Number.isInteger(value) ? value : null;
    if (typeof value === "string" && /^\s*-?\d+\s*$/.test(value)) return Number.parseInt(value, 10);
    return null;
}

interface LengthRule {
    label: string;
    min?: number;
    max: number;
    nullable?: boolean;
}

function checkLength(errors: FieldErrors, data: Record<string, unknown>, field: string, rule: LengthRule): void {
    const value = data[field];
    if (value === undefined || errors[field]) return;
    if (value === null && rule.nullable) return;
    if (typeof value !== "string") {
        errors[field] = `${rule.label} must be a string`;
        return;
    }
    const length = charLength(value.trim());
    if (rule.min !== undefined && length < rule.min) {
        errors[field] = `${rule.label} must be at least ${rule.min} characters long`;
    } else if (length > rule.max) {
        errors[field] = `${rule.label} must not exceed ${rule.max} characters`;
    }
}

function checkUrl(errors: FieldErrors, data: Record<string, unknown>, field: string, label: string): void {
    const value = data[field];
    if (value === undefined || value === null || errors[field]) return;
    if (typeof value !== "string" || !isHttpUrl(value.trim())) {
        errors[field] = `${label} must be a valid HTTP/HTTPS URL`;
    }
}

export interface PayloadOptions {
    /** Updates validate only the fields that are present. */
    partial?: boolean;
    now?: Date;
}

export const EVENT_REQUIRED_FIELDS = ["title", "description", "datetime", "location", "city", "category"] as const;

export function validateEventData(data: Record<string, unknown>, options: PayloadOptions = {}): FieldErrors {
    const { partial = false, now = new Date() } = options;
    const errors: FieldErrors = partial ? {} : validateRequiredFields(data, EVENT_REQUIRED_FIELDS);

    checkLength(errors, data, "title", { label: "Title", min: 3, max: 200 });
    checkLength(errors, data, "description", { label: "Description", min: 10, max: 5000 });
    checkLength(errors, data, "location", { label: "Location", min: 3, max: 500 });
    checkLength(errors, data, "city", { label: "City", min: 1, max: 100 });
    checkLength(errors, data, "address", { label: "Address", max: 500, nullable: true });
    checkUrl(errors, data, "image_url", "Image URL");

    if (data.category !== undefined && !errors.category) {
        const category = typeof data.category === "string" ? data.category.trim().toLowerCase() : "";
        if (!isEventCategory(category)) {
            errors.category = `Category must be one of: ${EVENT_CATEGORIES.join(", ")}`;
        }
    }

    if (data.datetime !== undefined && !errors.datetime) {
        if (!isDateTime(data.datetime)) {
            errors.datetime = "Datetime must be a valid ISO 8601 date-time";
        } else if (!partial && Date.parse(data.datetime) <= now.getTime()) {
            errors.datetime = "Datetime must be in the future";
        }
    }

    if (data.end_datetime !== undefined && data.end_datetime !== null) {
        if (!isDateTime(data.end_datetime)) {
            errors.end_datetime = "End datetime must be a valid ISO 8601 date-time";
        } else if (isDateTime(data.datetime) && Date.parse(data.end_datetime) <= Date.parse(data.datetime)) {
            errors.end_datetime = "End datetime must be after the start datetime";
        }
    }

    if (data.capacity !== undefined && data.capacity !== null) {
        const capacity = parseCapacity(data.capacity);
        if (capacity === null) {
            errors.capacity = "Capacity must be a valid number";
        } else if (capacity < 1) {
            errors.capacity = "Capacity must be at least 1";
        } else if (capacity > MAX_CAPACITY) {
            errors.capacity = "Capacity must not exceed 1,000,000";
        }
    }

    if (data.status !== undefined) {
        const status = typeof data.status === "string" ? data.status.trim().toLowerCase() : "";
        if (!isEventStatus(status)) {
            errors.status = "Status must be active, canceled, or completed";
        }
    }

    return errors;
}

export const GROUP_REQUIRED_FIELDS = ["name", "description"] as const;

export function validateGroupData(data: Record<string, unknown>, options: PayloadOptions = {}): FieldErrors {
    const errors: FieldErrors = options.partial ? {} : validateRequiredFields(data, GROUP_REQUIRED_FIELDS);

    checkLength(errors, data, "name", { label: "Name", min: 3, max: 100 });
    checkLength(errors, data, "description", { label: "Description", min: 10, max: 1000 });
    checkLength(errors, data, "category", { label: "Category", max: 50, nullable: true });
    checkUrl(errors, data, "avatar_url", "Avatar URL");

    if (data.is_public !== undefined && typeof data.is_public !== "boolean") {
        errors.is_public = "Is Public must be true or false";
    }

    return errors;
}

export function validateProfileUpdate(data: Record<string, unknown>): FieldErrors {
    const errors: FieldErrors = {};

    if (data.name !== undefined) {
        const name = validateName(data.name);
        if (!name.ok) errors.name = name.message;
    }
    checkLength(errors, data, "bio", { label: "Bio", max: 500, nullable: true });
    checkLength(errors, data, "location", { label: "Location", max: 100, nullable: true });
    checkUrl(errors, data, "avatar_url", "Avatar URL");

    return errors;
}

export function validateMessageContent(content: unknown): Check {
    if (typeof content !== "string" || content.trim() === "") return fail("Message cannot be empty");
    if (charLength(content.trim()) > MAX_MESSAGE_LENGTH) {
        return fail(`Message must not exceed ${MAX_MESSAGE_LENGTH} characters`);
    }
    return OK;
}
