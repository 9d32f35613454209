export type TaskStatus = "pending" | "completed";

export interface Task {
  id: number;
  text: string;
  status: TaskStatus;
  created_at: string;
  completed_at?: string; // set by complete_task only
}

/** On-disk layout of the task file. */
export interface TaskStoreDocument {
  tasks: Task[];
  task_id_counter: number;
}

export interface Company {
  id: number;
  name?: string;
  tagline?: string;
  description?: string;
  industry?: string;
  hq?: string;
  year_founded?: number;
  employees?: string | number;
  last_round?: string;
  last_round_size?: number;
  valuation?: number;
  funding_history?: string[];
}

export interface CompanyDirectoryData {
  companies: Company[];
  industries: string[];
  funding_stages: string[];
}

export interface CompanyFilters {
  industry?: string;
  funding_stage?: string;
  hq?: string;
  year?: number;
  search?: string;
}
