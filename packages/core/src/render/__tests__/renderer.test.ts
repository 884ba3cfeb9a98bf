/**
 * Template renderer tests.
 * Covers the four placeholder forms, loops, fallbacks and the single-pass rule.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { renderTemplate, resolveLoopRows, stringifyValue } from '../renderer.js';
import type { ResultBinding } from '../types.js';

const customer: ResultBinding = {
  customer: [{ name: 'Acme', balance: '500' }],
};

// ── Scalar and dotted placeholders ──────────────────────────────────

describe('renderTemplate placeholders', () => {
  it('resolves dotted fields against the first row', () => {
    assert.equal(renderTemplate('{{customer.name}} owes {{customer.balance}}', customer), 'Acme owes 500');
  });

  it('accepts single braces for dotted fields', () => {
    assert.equal(renderTemplate('{customer.name} owes {customer.balance}', customer), 'Acme owes 500');
  });

  it('tolerates whitespace inside double braces', () => {
    assert.equal(renderTemplate('{{ customer.name }}', customer), 'Acme');
  });

  it('uses the only column of the first row as a scalar', () => {
    const binding: ResultBinding = { total: [{ 'COUNT(*)': 42 }, { 'COUNT(*)': 7 }] };
    assert.equal(renderTemplate('Total: {total} / {{total}}', binding), 'Total: 42 / 42');
  });

  it('renders a multi-column first row as JSON', () => {
    assert.equal(renderTemplate('{customer}', customer), '{"name":"Acme","balance":"500"}');
  });

  it('renders an empty row sequence as an empty string', () => {
    assert.equal(renderTemplate('[{{none}}]', { none: [] }), '[]');
  });

  it('renders directly bound scalars', () => {
    const binding: ResultBinding = { n: 3, big: 12345678901234567890n, flag: false, nothing: null };
    assert.equal(renderTemplate('{n} {big} {flag} [{nothing}]', binding), '3 12345678901234567890 false []');
  });

  it('renders dates as ISO-8601', () => {
    const binding: ResultBinding = { due: [{ date: new Date('2024-03-01T00:00:00.000Z') }] };
    assert.equal(renderTemplate('{{due.date}}', binding), '2024-03-01T00:00:00.000Z');
  });

  it('leaves an unknown key literal', () => {
    assert.equal(renderTemplate('{{missing.name}}', {}), '{{missing.name}}');
    assert.equal(renderTemplate('{missing}', {}), '{missing}');
  });

  it('leaves an unknown field literal', () => {
    assert.equal(renderTemplate('{{customer.phone}}', customer), '{{customer.phone}}');
  });

  it('leaves a dotted placeholder on a scalar binding literal', () => {
    assert.equal(renderTemplate('{{n.value}}', { n: 1 }), '{{n.value}}');
  });

  it('does not resolve keys inherited from Object.prototype', () => {
    assert.equal(renderTemplate('{toString}', {}), '{toString}');
  });
});

// ── Indexed placeholders ────────────────────────────────────────────

describe('renderTemplate indexed placeholders', () => {
  const binding: ResultBinding = {
    top: [
      { name: 'Pen', qty: 10 },
      { name: 'Pad', qty: 5 },
    ],
  };

  it('resolves a row by zero-based index', () => {
    assert.equal(renderTemplate('{{top[1].name}}: {{top[1].qty}}', binding), 'Pad: 5');
  });

  it('leaves an out-of-range index literal', () => {
    assert.equal(renderTemplate('{{top[2].name}}', binding), '{{top[2].name}}');
  });

  it('only accepts indexing in double braces', () => {
    assert.equal(renderTemplate('{top[0].name}', binding), '{top[0].name}');
  });

  it('leaves an index without a field literal', () => {
    assert.equal(renderTemplate('{{top[0]}}', binding), '{{top[0]}}');
  });
});

// ── Loops ───────────────────────────────────────────────────────────

describe('renderTemplate loops', () => {
  const items: ResultBinding = {
    top_items: [
      { name: 'Pen', qty: 10 },
      { name: 'Pad', qty: 5 },
    ],
  };

  it('concatenates the body once per row', () => {
    const template = 'Top items: {% for item in top_items %}- {{item.name}}: {{item.qty}}{% endfor %}';
    assert.equal(renderTemplate(template, items), 'Top items: - Pen: 10- Pad: 5');
  });

  it('numbers rows from one with loop.index', () => {
    const template = '{% for item in top_items %}{{loop.index}}. {{item.name}}\n{% endfor %}';
    assert.equal(renderTemplate(template, items), '1. Pen\n2. Pad\n');
  });

  it('matches a body spanning several lines', () => {
    const template = '{%for item in top_items%}\n* {{item.name}}\n{%endfor%}';
    assert.equal(renderTemplate(template, items), '\n* Pen\n\n* Pad\n');
  });

  it('resolves binding placeholders inside the body', () => {
    const binding: ResultBinding = { ...items, total: [{ n: 2 }] };
    const template = '{% for item in top_items %}{{item.name}} of {{total}};{% endfor %}';
    assert.equal(renderTemplate(template, binding), 'Pen of 2;Pad of 2;');
  });

  it('leaves a missing loop-variable field literal instead of reading a binding key of the same name', () => {
    const binding: ResultBinding = {
      customers: [{ name: 'A' }, { name: 'B' }],
      customer: [{ email: 'boss@example.com' }],
    };
    const template = '{% for customer in customers %}[{{customer.email}}]{% endfor %}';
    assert.equal(renderTemplate(template, binding), '[{{customer.email}}][{{customer.email}}]');
  });

  it('keeps loop placeholders bound to the loop inside the body', () => {
    const binding: ResultBinding = { ...items, loop: [{ count: 9 }] };
    const template = '{{loop.count}}:{% for item in top_items %}{{loop.index}}{{loop.count}};{% endfor %}';
    assert.equal(renderTemplate(template, binding), '9:1{{loop.count}};2{{loop.count}};');
  });

  it('removes a loop over an absent key', () => {
    assert.equal(renderTemplate('A{% for x in nothing %}[{{x.name}}]{% endfor %}B', {}), 'AB');
  });

  it('removes a loop over an empty result', () => {
    assert.equal(renderTemplate('A{% for x in rows %}{{x.id}}{% endfor %}B', { rows: [] }), 'AB');
  });

  it('falls back to a key that contains the loop key', () => {
    const template = '{% for item in items %}{{item.name}},{% endfor %}';
    assert.equal(renderTemplate(template, items), 'Pen,Pad,');
  });

  it('skips the fuzzy fallback when it is disabled', () => {
    const template = 'X{% for item in items %}{{item.name}}{% endfor %}Y';
    assert.equal(renderTemplate(template, items, { fuzzyLoopKeys: false }), 'XY');
  });

  it('closes a loop at the first endfor', () => {
    const template = '{% for a in top_items %}{{a.name}}{% endfor %}|{% endfor %}';
    assert.equal(renderTemplate(template, items), 'PenPad|{% endfor %}');
  });

  it('leaves a loop without endfor literal and still substitutes around it', () => {
    const template = '{% for item in top_items %}{{top_items.name}}';
    assert.equal(renderTemplate(template, items), '{% for item in top_items %}Pen');
  });
});

// ── Single pass ─────────────────────────────────────────────────────

describe('renderTemplate single pass', () => {
  it('does not re-interpret braces coming from data', () => {
    const binding: ResultBinding = {
      note: [{ text: '{{secret.value}}' }],
      secret: [{ value: 'leaked' }],
    };
    assert.equal(renderTemplate('Note: {{note.text}}', binding), 'Note: {{secret.value}}');
  });

  it('does not re-interpret loop output', () => {
    const binding: ResultBinding = {
      rows: [{ v: '{other}' }],
      other: 'x',
    };
    assert.equal(renderTemplate('{% for r in rows %}{{r.v}}{% endfor %}', binding), '{other}');
  });

  it('is deterministic', () => {
    const template = '{% for item in top %}{{item.name}}{% endfor %} {top[0].name}';
    const binding: ResultBinding = { top: [{ name: 'Pen' }] };
    assert.equal(renderTemplate(template, binding), renderTemplate(template, binding));
  });
});

describe('resolveLoopRows', () => {
  it('prefers the exact key over fuzzy candidates', () => {
    const binding: ResultBinding = { top_items: [{ a: 1 }], items: [{ a: 2 }] };
    assert.deepEqual(resolveLoopRows('items', binding), [{ a: 2 }]);
  });

  it('does not fall back when the exact key is a scalar', () => {
    assert.equal(resolveLoopRows('items', { items: 3, top_items: [{ a: 1 }] }), null);
  });
});

describe('stringifyValue', () => {
  it('serialises nested bigints', () => {
    assert.equal(stringifyValue({ id: 10n }), '{"id":"10"}');
  });

  it('renders an invalid date as empty', () => {
    assert.equal(stringifyValue(new Date(Number.NaN)), '');
  });
});
