import type { PaperId, Term } from './term.js';

/**
 * One literal piece of evidence: a paper whose text mentions both
 * the GO term and the metabolite.
 */
export interface AssociationRow {
    goTerm: Term;
    metabolite: Term;
    paperId: PaperId;
}

/**
 * Association credited to a GO term or one of its allowed ancestors.
 * Same shape as a direct row; `goTerm` ranges over the ancestor chain.
 */
export type ExpandedAssociationRow = AssociationRow;

/** Which stage of the pipeline produced a stored association */
export type AssociationKind = 'direct' | 'expanded';

/** Column headers of the association table sink */
export const ASSOCIATION_COLUMNS = ['Gene Ontology', 'Metabolite', 'Paper ID'] as const;
