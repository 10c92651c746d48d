/**
 * Department Entity
 * One of the nine fixed municipal departments a complaint is routed to
 */
export enum Department {
  ELECTRICAL = 'Electrical Department',
  WATER = 'Water Department',
  PUBLIC_WORKS = 'Public Works Department',
  SANITATION = 'Sanitation Department',
  REVENUE = 'Revenue Department',
  MUNICIPAL_CORPORATION = 'Municipal Corporation',
  HEALTH = 'Health Department',
  EDUCATION = 'Education Department',
  GENERAL_ADMINISTRATION = 'General Administration'
}

/** Ledger file of each department (relative to the data directory) */
export const DEPARTMENT_LEDGER_FILES: Readonly<Record<Department, string>> = {
  [Department.ELECTRICAL]: 'electrical_department.csv',
  [Department.WATER]: 'water_department.csv',
  [Department.PUBLIC_WORKS]: 'public_works_department.csv',
  [Department.SANITATION]: 'sanitation_department.csv',
  [Department.REVENUE]: 'revenue_department.csv',
  [Department.MUNICIPAL_CORPORATION]: 'municipal_corporation.csv',
  [Department.HEALTH]: 'health_department.csv',
  [Department.EDUCATION]: 'education_department.csv',
  [Department.GENERAL_ADMINISTRATION]: 'general_administration.csv'
};

export const ALL_DEPARTMENTS: readonly Department[] = Object.values(Department);

export function isDepartment(value: string): value is Department {
  return ALL_DEPARTMENTS.some(department => department === value);
}
