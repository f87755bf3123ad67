import type { FastifyReply } from "fastify";
import { ValidationError, type AppError, type FieldErrors } from "./errors.js";

export interface SuccessBody<T = unknown> {
    success: true;
    message?: string;
    data?: T;
}

export interface ErrorBody {
    success: false;
    error: string;
    details?: Record<string, unknown>;
    validation_errors?: FieldErrors;
}

export type Envelope<T = unknown> = SuccessBody<T> | ErrorBody;

export interface ApiResponse<T = unknown> {
    status: number;
    body: Envelope<T>;
}

export function success<T>(data?: T, message?: string, status = 200): ApiResponse<T> {
    const body: SuccessBody<T> = { success: true };
    if (message) body.message = message;
    if (data !== undefined) body.data = data;
    return { status, body };
}

export function error(message: string, status = 400, details?: Record<string, unknown>): ApiResponse<never> {
    const body: ErrorBody = { success: false, error: message };
    if (details && Object.keys(details).length > 0) body.details = details;
    return { status, body };
}

export function validationError(fields: FieldErrors): ApiResponse<never> {
    return {
        status: 400,
        body: { success: false, error: "Validation failed", validation_errors: fields },
    };
}

export function fromAppError(err: AppError): ApiResponse<never> {
    if (err instanceof ValidationError) return validationError(err.fields);
    return error(err.message, err.statusCode, err.details);
}

export function send<T>(reply: FastifyReply, response: ApiResponse<T>): FastifyReply {
    return reply.code(response.status).send(response.body);
}
