import { RequireProvenanceRule } from './require-provenance.rule';
import { createCanonicalRecord } from '../../__mocks__/raw-record.fixtures';

describe('RequireProvenanceRule', () => {
  let rule: RequireProvenanceRule;

  beforeEach(() => {
    rule = new RequireProvenanceRule();
  });

  it('should drop records with neither developer nor publisher', () => {
    expect(rule.apply(createCanonicalRecord())).toEqual({ action: 'dropped' });
  });

  it('should keep records naming either one', () => {
    const withDeveloper = createCanonicalRecord({ developer: 'Dev' });
    const withPublisher = createCanonicalRecord({ publisher: 'Pub' });

    expect(rule.apply(withDeveloper)).toEqual({ action: 'unchanged', record: withDeveloper });
    expect(rule.apply(withPublisher)).toEqual({ action: 'unchanged', record: withPublisher });
  });
});
