export interface StatusResponse {
  status: string;
}

export interface TaskCreatedResponse {
  taskId: string;
}

export interface DeletedResponse {
  deleted: true;
}
