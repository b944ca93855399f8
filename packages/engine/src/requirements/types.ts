/** One requirement clause; a `requires` mapping may combine several */
export type RequirementClause =
  | { kind: 'env'; variable: string }
  | { kind: 'installed'; program: string }
  | { kind: 'shell'; command: string; timeout?: number }
  | { kind: 'module'; module: string };

export interface ClauseResult {
  clause: RequirementClause;
  satisfied: boolean;
  detail: string;
}
