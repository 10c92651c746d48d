import { Classification, UrgencyLevel } from '../entities/Complaint.js';
import { Department } from '../entities/Department.js';

/**
 * One row of an ordered rule table: substring keyword → outcome
 */
export interface KeywordRule<T> {
  readonly keyword: string;
  readonly outcome: T;
}

export type RuleTable<T> = readonly KeywordRule<T>[];

/**
 * Department rules, matched against the complaint type and the description.
 * Order matters: the first keyword found wins.
 */
export const DEPARTMENT_RULES: RuleTable<Department> = [
  { keyword: 'electricity', outcome: Department.ELECTRICAL },
  { keyword: 'water', outcome: Department.WATER },
  { keyword: 'road', outcome: Department.PUBLIC_WORKS },
  { keyword: 'sanitation', outcome: Department.SANITATION },
  { keyword: 'tax', outcome: Department.REVENUE },
  { keyword: 'property', outcome: Department.MUNICIPAL_CORPORATION },
  { keyword: 'health', outcome: Department.HEALTH },
  { keyword: 'education', outcome: Department.EDUCATION },
  { keyword: 'other', outcome: Department.GENERAL_ADMINISTRATION }
];

/**
 * Urgency rules, matched against the description only. First match wins.
 */
export const URGENCY_RULES: RuleTable<UrgencyLevel> = [
  { keyword: 'emergency', outcome: UrgencyLevel.HIGH },
  { keyword: 'urgent', outcome: UrgencyLevel.HIGH },
  { keyword: 'critical', outcome: UrgencyLevel.HIGH },
  { keyword: 'important', outcome: UrgencyLevel.MEDIUM },
  { keyword: 'normal', outcome: UrgencyLevel.MEDIUM },
  { keyword: 'routine', outcome: UrgencyLevel.LOW },
  { keyword: 'minor', outcome: UrgencyLevel.LOW }
];

/**
 * Any of these in the description forces High, whatever the rule table said
 */
export const EMERGENCY_KEYWORDS: readonly string[] = [
  'emergency',
  'urgent',
  'immediate',
  'critical',
  'accident',
  'fire',
  'flood'
];

export const DEFAULT_DEPARTMENT = Department.GENERAL_ADMINISTRATION;
export const DEFAULT_URGENCY = UrgencyLevel.MEDIUM;

/**
 * Keyword classifier for complaints.
 *
 * Matching is plain substring search on lower-cased text, not tokenized:
 * "waterlogged" matches "water". Tables are first-match, not best-match:
 * reorder a table to change precedence.
 */
export class ComplaintClassifier {
  constructor(
    private readonly departmentRules: RuleTable<Department> = DEPARTMENT_RULES,
    private readonly urgencyRules: RuleTable<UrgencyLevel> = URGENCY_RULES,
    private readonly emergencyKeywords: readonly string[] = EMERGENCY_KEYWORDS
  ) {}

  classify(complaintType: string, description: string): Classification {
    const type = complaintType.toLowerCase();
    const text = description.toLowerCase();

    const department =
      firstMatch(this.departmentRules, keyword => type.includes(keyword) || text.includes(keyword)) ??
      DEFAULT_DEPARTMENT;

    let urgency = firstMatch(this.urgencyRules, keyword => text.includes(keyword)) ?? DEFAULT_URGENCY;
    if (this.emergencyKeywords.some(keyword => text.includes(keyword))) {
      urgency = UrgencyLevel.HIGH;
    }

    return { department, urgency };
  }
}

function firstMatch<T>(rules: RuleTable<T>, matches: (keyword: string) => boolean): T | null {
  const rule = rules.find(candidate => matches(candidate.keyword));
  return rule ? rule.outcome : null;
}
