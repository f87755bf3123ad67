import { z } from "zod";
import { BadRequestError, ValidationError, type FieldErrors } from "./errors.js";
import { validateUuid, type Check } from "./validators.js";

const bodySchema = z.record(z.unknown());

/** A JSON object with at least one key, or 400 "Request body is required". */
export function requireBody(body: unknown): Record<string, unknown> {
    const parsed = bodySchema.safeParse(body);
    if (!parsed.success || Array.isArray(body) || Object.keys(parsed.data).length === 0) {
        throw new BadRequestError("Request body is required");
    }
    return parsed.data;
}

export function assertUuid(value: unknown): asserts value is string {
    const check = validateUuid(value);
    if (!check.ok) throw new BadRequestError(check.message);
}

/** Fails the request with a single-field validation error. */
export function assertField(field: string, check: Check): void {
    if (!check.ok) throw new ValidationError({ [field]: check.message });
}

/** Runs `check`, then narrows `value` to the accepted choices. */
export function requireChoice<T extends string>(
    field: string,
    value: string,
    check: Check,
    isChoice: (value: string) => value is T,
): T {
    assertField(field, check);
    if (!isChoice(value)) throw new ValidationError({ [field]: `Invalid ${field}` });
    return value;
}

export function assertNoFieldErrors(errors: FieldErrors): void {
    if (Object.keys(errors).length > 0) throw new ValidationError(errors);
}

/** Trimmed string value, or "" for anything that is not a string. */
export function text(value: unknown): string {
    return typeof value === "string" ? value.trim() : "";
}

/** Nullable optional text: blank and null clear the field. */
export function nullableText(value: unknown): string | null {
    const trimmed = text(value);
    return trimmed === "" ? null : trimmed;
}

/** Query parameters may repeat; only the first value is used. */
export function queryText(value: unknown): string {
    return text(Array.isArray(value) ? value[0] : value);
}

export function includesText(haystack: readonly (string | null)[], needle: string): boolean {
    const lowered = needle.toLowerCase();
    return haystack.some((value) => value !== null && value.toLowerCase().includes(lowered));
}
