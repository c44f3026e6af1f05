import { ZodError } from "zod";

export default class AppError extends Error {
  readonly statusCode: number;
  readonly status: "fail" | "error";
  readonly code: string;
  readonly isOperational = true;

  constructor(message: string, statusCode: number, code = "app_error") {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.status = `${statusCode}`.startsWith("4") ? "fail" : "error";
    this.code = code;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, "invalid_message");
  }

  static fromZod(error: ZodError, subject: string): ValidationError {
    const details = error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
      .join("; ");
    return new ValidationError(`Invalid ${subject}: ${details}`);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, "not_found");
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, "conflict");
  }
}

export class TransitionError extends AppError {
  constructor(message: string) {
    super(message, 409, "illegal_transition");
  }
}

export class ChannelClosedError extends Error {
  constructor(channelId: string) {
    super(`Channel ${channelId} is closed`);
    this.name = "ChannelClosedError";
  }
}
