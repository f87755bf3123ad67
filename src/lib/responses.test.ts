import { describe, expect, it } from "vitest";
import { AuthorizationError, BadRequestError, ConflictError, InternalError, ValidationError } from "./errors.js";
import { error, fromAppError, success, validationError } from "./responses.js";

describe("response envelope", () => {
    it("omits absent message and data", () => {
        expect(success()).toEqual({ status: 200, body: { success: true } });
        expect(success(undefined, "Logout successful")).toEqual({
            status: 200,
            body: { success: true, message: "Logout successful" },
        });
        expect(success({ id: "e1" }, "Created", 201)).toEqual({
            status: 201,
            body: { success: true, message: "Created", data: { id: "e1" } },
        });
    });

    it("keeps falsy data other than undefined", () => {
        expect(success(null).body).toEqual({ success: true, data: null });
        expect(success([]).body).toEqual({ success: true, data: [] });
    });

    it("builds error bodies with optional details", () => {
        expect(error("Event not found", 404)).toEqual({
            status: 404,
            body: { success: false, error: "Event not found" },
        });
        expect(error("Bad", 400, {})).toEqual({ status: 400, body: { success: false, error: "Bad" } });
        expect(error("Bad", 400, { field: "city" }).body).toEqual({
            success: false,
            error: "Bad",
            details: { field: "city" },
        });
    });

    it("returns validation errors under a fixed key", () => {
        expect(validationError({ email: "Invalid email address" })).toEqual({
            status: 400,
            body: {
                success: false,
                error: "Validation failed",
                validation_errors: { email: "Invalid email address" },
            },
        });
    });
});

describe("fromAppError", () => {
    it("maps each error class onto its status", () => {
        expect(fromAppError(new BadRequestError("No fields to update"))).toEqual({
            status: 400,
            body: { success: false, error: "No fields to update" },
        });
        expect(fromAppError(new ConflictError("Email already registered")).status).toBe(400);
        expect(fromAppError(new AuthorizationError())).toEqual({
            status: 403,
            body: { success: false, error: "You do not have permission to access this resource" },
        });
        expect(fromAppError(new InternalError())).toEqual({
            status: 500,
            body: { success: false, error: "An unexpected error occurred" },
        });
    });

    it("expands validation errors", () => {
        expect(fromAppError(new ValidationError({ name: "Name is required" })).body).toEqual({
            success: false,
            error: "Validation failed",
            validation_errors: { name: "Name is required" },
        });
    });
});
