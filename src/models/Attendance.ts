export const ATTENDANCE_STATUSES = ['Present', 'Absent', 'Leave', 'Remote'] as const;
export const WORK_TYPES = ['Office', 'Remote', 'Leave'] as const;

export type AttendanceStatus = (typeof ATTENDANCE_STATUSES)[number];
export type WorkType = (typeof WORK_TYPES)[number];

export interface AttendanceRecord {
  id: string;
  userId: string;
  date: string; // ISO date string (YYYY-MM-DD)
  loginTime: Date | null;
  logoutTime: Date | null;
  status: AttendanceStatus;
  workType: WorkType;
  notes: string | null;
  // 0 until the record has been stored
  version: number;
  createdAt: number;
  updatedAt: number;
}

export interface AttendanceCorrection {
  status?: AttendanceStatus;
  workType?: WorkType;
  notes?: string | null;
}

export type RemoteLoginPolicy = 'keep-remote' | 'office';
