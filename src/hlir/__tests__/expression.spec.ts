import { hlirFrom } from '../../__fixtures__/programs';
import { expressionReads, formatExpression } from '../expression';
import { parseFieldId } from '../fieldId';

describe('expressions', () => {
  const hlir = hlirFrom({
    headerTypes: { ipv4_t: { fields: { ttl: 8, protocol: 8 } } },
    headers: { ipv4: { type: 'ipv4_t' } },
    tables: {},
    conditionals: {
      c: {
        expression: {
          op: 'or',
          left: { op: 'not', operand: { valid: 'ipv4' } },
          right: { op: '==', left: { field: 'ipv4.ttl' }, right: { const: 1 } },
        },
        true: null,
        false: null,
      },
    },
  });
  const expression = hlir.conditionals.require('c').expression;

  it('lists the fields a condition reads', () => {
    expect(expressionReads(expression)).toEqual(['ipv4.$valid', 'ipv4.ttl']);
  });

  it('renders a condition for labels', () => {
    expect(formatExpression(expression)).toBe('(not valid(ipv4) or (ipv4.ttl == 1))');
  });
});

describe('parseFieldId', () => {
  it('splits header, stack index and member', () => {
    expect(parseFieldId('ipv4.ttl')).toEqual({ base: 'ipv4', member: 'ttl' });
    expect(parseFieldId('vlan[1].vid')).toEqual({ base: 'vlan', index: 1, member: 'vid' });
    expect(parseFieldId('vlan[last].$valid')).toEqual({ base: 'vlan', index: 'last', member: '$valid' });
    expect(parseFieldId('register:flow_count')).toEqual({ base: 'register:flow_count', member: '' });
    expect(parseFieldId('not a field')).toBeUndefined();
  });
});
