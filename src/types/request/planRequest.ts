export interface CreatePlanRequest {
  goal: string;
}

export interface ListPlansQuery {
  limit?: number;
}
