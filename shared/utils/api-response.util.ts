/**
 * API Response Utility
 * Error bodies always carry a `detail` field: a message, or a list of field problems for validation failures.
 */

export interface FieldProblem {
  field: string;
  message: string;
}

export interface ErrorDetail {
  detail: string | FieldProblem[];
}

export interface InsertedResponse<T> {
  status: 'inserted';
  data: T;
}

export class ApiResponseUtil {
  static inserted<T>(data: T): InsertedResponse<T> {
    return {
      status: 'inserted',
      data,
    };
  }

  static error(detail: string | FieldProblem[]): ErrorDetail {
    return { detail };
  }

  static messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
