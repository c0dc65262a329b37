/**
 * Table mutators module
 * @module mutators
 */

export type {
  MutationContext,
  MutatorReport,
  TableMutator,
  FieldRuleSet,
} from './types.js'

export {
  FLAG_VALUE,
  applyFieldRules,
  commonSupplierName,
  childRowIndexes,
  rowIdentifier,
} from './field-rules.js'

export {
  FieldRuleMutator,
  GeneralMutator,
  AddressMutator,
  SupplierGeneralMutator,
  GENERAL_RULES,
  GENERAL_REPORT_FLAGS,
  SUPPLIER_GENERAL_RULES,
} from './field-rule-mutator.js'

export {
  AssociationMutator,
  PartnerFunctionMutator,
  SUPPLIER_PARTNER_FUNCTION,
} from './association-mutator.js'

export {
  reconcileAssociations,
  collectCodesByIdentifier,
  ACTION_CODE_COLUMN,
  INSERT_ACTION,
  type ReconciliationResult,
} from './reconciliation.js'

import type { TableMutator } from './types.js'
import {
  GeneralMutator,
  AddressMutator,
  SupplierGeneralMutator,
} from './field-rule-mutator.js'
import { AssociationMutator, PartnerFunctionMutator } from './association-mutator.js'

/**
 * The mutators of a run, in the order they are applied
 */
export function createDefaultMutators(): TableMutator[] {
  return [
    new GeneralMutator(),
    new AddressMutator(),
    new SupplierGeneralMutator(),
    new AssociationMutator('companyCode', 'BUKRS', false),
    new AssociationMutator('purchasingOrg', 'EKORG', true),
    new PartnerFunctionMutator(),
  ]
}
