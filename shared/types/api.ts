export interface APIResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  timestamp: string;
}

export interface APIError {
  code: string;
  message: string;
  statusCode: number;
  details?: unknown;
}

