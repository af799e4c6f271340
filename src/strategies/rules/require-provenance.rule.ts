import { Injectable } from '@nestjs/common';
import { CanonicalRecord } from '../../interfaces/canonical-record.interface';
import { BusinessRule, RuleOutcome } from '../../interfaces/business-rule.interface';

/**
 * Require Provenance
 *
 * A catalog entry must name who made or published it. Records with
 * neither a developer nor a publisher are dropped.
 */
@Injectable()
export class RequireProvenanceRule implements BusinessRule {
  readonly name = 'require-provenance';

  apply(record: CanonicalRecord): RuleOutcome {
    if (record.developer === null && record.publisher === null) {
      return { action: 'dropped' };
    }
    return { action: 'unchanged', record };
  }
}
