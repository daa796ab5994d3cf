import { loadFixture, sketchProgram } from '../../__fixtures__/programs';
import { controlFlowToDot } from '../controlFlowGraph';
import { parseGraphToDot } from '../parseGraph';

describe('program graphs', () => {
  const hlir = loadFixture('basic_routing.json');

  it('draws parse states with their extracted headers', () => {
    expect(parseGraphToDot(hlir)).toBe(
      [
        'digraph "basic_routing_parser" {',
        '  "start" [label="start\\nethernet", shape="ellipse"];',
        '  "parse_vlan" [label="parse_vlan\\nvlan[next]", shape="ellipse"];',
        '  "parse_ipv4" [label="parse_ipv4\\nipv4", shape="ellipse"];',
        '  "start" -> "parse_vlan" [label="0x8100"];',
        '  "start" -> "parse_ipv4" [label="0x0800"];',
        '  "start" -> "ingress" [label="default"];',
        '  "parse_vlan" -> "parse_vlan" [label="0x8100"];',
        '  "parse_vlan" -> "parse_ipv4" [label="0x0800"];',
        '  "parse_vlan" -> "ingress" [label="default"];',
        '  "parse_ipv4" -> "ingress" [label="default"];',
        '  "ingress" [shape="doublecircle"];',
        '}',
        '',
      ].join('\n')
    );
  });

  describe('controlFlowToDot', () => {
    const lines = controlFlowToDot(hlir).split('\n');

    it('starts every pipeline at its entry node', () => {
      expect(lines.slice(0, 5)).toEqual([
        'digraph "basic_routing_tables" {',
        '  "pipeline:ingress" [label="ingress", shape="doublecircle"];',
        '  "pipeline:ingress" -> "port_mapping";',
        '  "pipeline:egress" [label="egress", shape="doublecircle"];',
        '  "pipeline:egress" -> "send_frame";',
      ]);
    });

    it('labels branches', () => {
      expect(lines).toContain('  "vlan_check" -> "vlan_strip" [label="true"];');
      expect(lines).toContain('  "vlan_check" -> "ipv4_check" [label="false"];');
      expect(lines).toContain('  "ipv4_lpm" -> "forward" [label="hit"];');
      expect(lines).toContain('  "send_frame" -> "flow_stats" [label="rewrite_mac"];');
      expect(lines).toContain('  "port_mapping" -> "vlan_check";');
    });

    it('keeps a table named like a pipeline apart from the pipeline', () => {
      const program = sketchProgram({ tables: { ingress: { reads: ['a'] } }, pipelines: { ingress: 'ingress' } });

      expect(controlFlowToDot(program).split('\n')).toEqual([
        'digraph "sketch_tables" {',
        '  "pipeline:ingress" [label="ingress", shape="doublecircle"];',
        '  "pipeline:ingress" -> "ingress";',
        '  "ingress" [shape="ellipse"];',
        '}',
        '',
      ]);
    });

    it('leaves out unreachable tables', () => {
      expect(lines.filter(line => line.includes('unused_acl'))).toEqual([]);
    });

    it('prints condition text on request', () => {
      expect(controlFlowToDot(hlir, { showConditionText: true }).split('\n')).toContain(
        '  "ipv4_check" [label="ipv4_check\\n(valid(ipv4) and (ipv4.ttl > 0))", shape="box"];'
      );
    });
  });
});
