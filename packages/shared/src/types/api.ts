export interface ApiErrorResponse {
  data: null;
  meta: null;
  errors: ApiError[];
}

export interface ApiError {
  code: string;
  field: string | null;
  message: string;
}
