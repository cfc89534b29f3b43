export type IssueCategory =
  | 'healthcare'
  | 'education'
  | 'sports'
  | 'facilities'
  | 'religious_exemption'
  | 'schools_speech'
  | 'identity_documents'
  | 'expression'
  | 'public_accommodations'
  | 'other';

export interface IssueCategoryGroup {
  category: IssueCategory;
  keywords: readonly string[];
}

/**
 * Keyword groups, in the order categories are listed on output.
 *
 * Matching is plain substring containment on the lowercased issues text,
 * so short keywords such as 'id' also hit words like "guidance".
 */
export const ISSUE_CATEGORY_GROUPS: readonly IssueCategoryGroup[] = [
  { category: 'healthcare', keywords: ['healthcare', 'medical'] },
  { category: 'education', keywords: ['school', 'student', 'educator'] },
  { category: 'sports', keywords: ['sports'] },
  { category: 'facilities', keywords: ['facilities', 'bathroom'] },
  { category: 'religious_exemption', keywords: ['religious'] },
  { category: 'schools_speech', keywords: ['curriculum', 'outing', "don't say"] },
  { category: 'identity_documents', keywords: ['id', 'definition of sex', 're-definition'] },
  { category: 'expression', keywords: ['drag', 'expression'] },
  { category: 'public_accommodations', keywords: ['accommodation'] },
];

export const ALL_ISSUE_CATEGORIES: readonly IssueCategory[] = [
  ...ISSUE_CATEGORY_GROUPS.map((group) => group.category),
  'other',
];

/**
 * Map the tracker's free-text issue tags to broader categories.
 *
 * Never returns an empty set: no match (or no issues at all) is {'other'}.
 */
export function categorizeIssues(issues: string | null): Set<IssueCategory> {
  if (issues === null) {
    return new Set<IssueCategory>(['other']);
  }

  const issuesLower = issues.toLowerCase();
  const categories = new Set<IssueCategory>();

  for (const group of ISSUE_CATEGORY_GROUPS) {
    if (group.keywords.some((keyword) => issuesLower.includes(keyword))) {
      categories.add(group.category);
    }
  }

  return categories.size > 0 ? categories : new Set<IssueCategory>(['other']);
}
