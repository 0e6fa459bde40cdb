export interface SuccessBody<T> {
  success: true;
  statusCode: number;
  message: string;
  data: T;
}

export interface ErrorBody {
  success: false;
  statusCode: number;
  error: string;
  code: string;
  details?: unknown;
  stack?: string;
}

export interface ListBody<T> {
  success: true;
  count: number;
  data: T[];
}

export interface PageBody<T> extends ListBody<T> {
  total: number;
  limit: number;
  offset: number;
}

export class ApiResponse {
  static success<T>(data: T, message: string = 'Success', statusCode: number = 200): SuccessBody<T> {
    return {
      success: true,
      statusCode,
      message,
      data,
    };
  }

  static list<T>(data: T[]): ListBody<T> {
    return {
      success: true,
      count: data.length,
      data,
    };
  }

  static page<T>(data: T[], total: number, limit: number, offset: number): PageBody<T> {
    return {
      success: true,
      count: data.length,
      total,
      limit,
      offset,
      data,
    };
  }

  static error(
    error: string = 'Error',
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    details?: unknown
  ): ErrorBody {
    return {
      success: false,
      statusCode,
      error,
      code,
      ...(details === undefined ? {} : { details }),
    };
  }
}
