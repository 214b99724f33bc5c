export enum UserRole {
  ADMIN = 'admin',
  INSTRUCTOR = 'instructor',
}

// Roles granted by the configured allow-lists, independent of stored users.
export enum AccessRole {
  ADMIN = 'admin',
  INSTRUCTOR = 'instructor',
  SECRETARY = 'secretary',
}

export enum ReportGranularity {
  DAY = 'day',
  WEEK = 'week',
  MONTH = 'month',
}

export enum ReportView {
  RAW = 'raw',
  GROUPED = 'grouped',
  PIVOT = 'pivot',
  RATES = 'rates',
}
