import type { Paper, PaperOverview, PaperSection } from '../../db/client';
import type { RequestStatus } from '../../pipeline/requestTracker';

// Response envelopes for API endpoints

export interface DataResponse<T> {
  data: T;
}

export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    statusCode: number;
  };
}

export interface SubmittedRequest {
  request_id: string;
  status: RequestStatus['status'];
  message: string;
}

export type SubmitResponse = DataResponse<SubmittedRequest>;
export type RequestStatusResponse = DataResponse<RequestStatus>;
export type PaperListResponse = DataResponse<PaperOverview[]>;
export type PaperDetailResponse = DataResponse<{ paper: Paper; sections: PaperSection[] }>;
