// ============================================================================
// API Request/Response Types
// ============================================================================

// Every error body carries `detail` with the human-readable message,
// alongside the structured error object.
export interface APIErrorResponse {
  success: false;
  detail: string;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    stack?: string;
  };
  requestId: string;
  timestamp: string;
}
