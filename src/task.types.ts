/** The tasks the renderer can run. */
export enum RotationTask {
  RENDER_SCHEDULE = 'render_schedule',
  // Checks the renderer against stored fixtures
  SELF_TEST = 'self_test',
  CURRENT_ONCALL = 'current_oncall',
}

/** Renders the schedule for a window. */
export interface RenderScheduleTask {
  task: RotationTask.RENDER_SCHEDULE;
  schedule_path: string;
  overrides_path?: string;
  from?: string;
  until: string;
  /** Logs per-user coverage totals */
  diagnostics?: boolean;
}

export interface SelfTestTask {
  task: RotationTask.SELF_TEST;
  /** Fixture files, or directories of fixture files */
  fixture_paths: string[];
}

/** Looks up the shift covering one instant. */
export interface CurrentOncallTask {
  task: RotationTask.CURRENT_ONCALL;
  schedule_path: string;
  overrides_path?: string;
  at: string;
}

/** The required object necessary for the handler to know what task to run. */
export type RotationTaskEvent = RenderScheduleTask | SelfTestTask | CurrentOncallTask;

export interface TaskResponse {
  exitCode: number;
  body: unknown;
}
