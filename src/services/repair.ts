/**
 * Textual repairs for defects the SQL generator is known to emit.
 *
 * Each rule is a regular expression over the statement with string literals
 * masked out. This is not a parser: rules only fire on narrow, recognisable
 * shapes and leave everything else alone.
 */

export interface RepairRule {
  name: string;
  pattern: RegExp;
  apply: (match: string, ...groups: string[]) => string;
}

const KEYWORDS = new Set([
  'ALL', 'AND', 'ANY', 'AS', 'ASC', 'BETWEEN', 'BY', 'CASE', 'CROSS', 'DELETE',
  'DESC', 'DISTINCT', 'ELSE', 'END', 'EXISTS', 'FROM', 'FULL', 'GROUP', 'HAVING',
  'ILIKE', 'IN', 'INNER', 'INSERT', 'INTO', 'IS', 'JOIN', 'LEFT', 'LIKE', 'LIMIT',
  'NOT', 'NULL', 'OFFSET', 'ON', 'OR', 'ORDER', 'OUTER', 'RETURNING', 'RIGHT',
  'SELECT', 'SET', 'SOME', 'THEN', 'UNION', 'UPDATE', 'USING', 'VALUES', 'WHEN',
  'WHERE',
]);

const PREDICATE_START = String.raw`(\b(?:WHERE|AND|OR|ON|HAVING)\s+|\(\s*)`;
const IDENT = String.raw`(?:[A-Za-z_]\w*|"[^"]+"|` + '`[^`]+`)';
const QUALIFIED = `${IDENT}(?:\\.${IDENT})?`;
const PLACEHOLDER = String.raw`:[A-Za-z_]\w*`;

export function isKeyword(word: string): boolean {
  return KEYWORDS.has(word.toUpperCase());
}

/**
 * `e.salary  :salary` → `e.salary > :salary`, also between two identifiers.
 * Needs two or more spaces, so repaired text never matches again.
 */
const MISSING_OPERATOR: RepairRule = {
  name: 'missing-operator',
  pattern: new RegExp(`${PREDICATE_START}(${QUALIFIED})\\s{2,}(${PLACEHOLDER}|${QUALIFIED})`, 'gi'),
  apply: (match, start, left, right) => {
    if (isKeyword(left) || (!right.startsWith(':') && isKeyword(right))) {
      return match;
    }
    return `${start}${left} > ${right}`;
  },
};

/**
 * `salary :salary` with a single space: only offered as a suggestion.
 */
const MISSING_OPERATOR_TIGHT: RepairRule = {
  name: 'missing-operator-single-space',
  pattern: new RegExp(`${PREDICATE_START}(${QUALIFIED})\\s+(${PLACEHOLDER})`, 'gi'),
  apply: (match, start, left, right) => (isKeyword(left) ? match : `${start}${left} > ${right}`),
};

const DOUBLED_EQUALS: RepairRule = {
  name: 'doubled-equals',
  pattern: /([^=!<>])==(?!=)/g,
  apply: (_match, before) => `${before}=`,
};

const TRAILING_COMMA: RepairRule = {
  name: 'trailing-comma',
  pattern: /,\s*\b(FROM|WHERE)\b/gi,
  apply: (_match, keyword) => ` ${keyword}`,
};

/**
 * Rules applied on every normalisation.
 */
export const OPERATOR_REPAIRS: readonly RepairRule[] = [MISSING_OPERATOR];

/**
 * Rules tried once after the backend reported a syntax error.
 */
export const DEFECT_REPAIRS: readonly RepairRule[] = [
  MISSING_OPERATOR,
  MISSING_OPERATOR_TIGHT,
  DOUBLED_EQUALS,
  TRAILING_COMMA,
];

export const MASK = '\u0001';

/**
 * Replace single-quoted literals with opaque tokens so rules cannot reach into them.
 */
export function maskLiterals(sql: string): {
  masked: string;
  literals: string[];
  restore: (text: string) => string;
} {
  const literals: string[] = [];
  const masked = sql.replace(/'(?:[^']|'')*'/g, (literal) => {
    literals.push(literal);
    return `${MASK}${literals.length - 1}${MASK}`;
  });
  const restore = (text: string) =>
    text.replace(new RegExp(`${MASK}(\\d+)${MASK}`, 'g'), (_token, index: string) => literals[Number(index)] ?? '');
  return { masked, literals, restore };
}

/**
 * Apply each rule once, in order, outside string literals.
 */
export function applyRepairs(sql: string, rules: readonly RepairRule[]): string {
  const { masked, restore } = maskLiterals(sql);
  let text = masked;
  for (const rule of rules) {
    rule.pattern.lastIndex = 0;
    text = text.replace(rule.pattern, (match: string, ...rest: unknown[]) =>
      rule.apply(match, ...rest.map((group) => (typeof group === 'string' ? group : ''))),
    );
  }
  return restore(text);
}

/**
 * Conservative operator repair used during normalisation.
 */
export function repairOperators(sql: string): string {
  return applyRepairs(sql, OPERATOR_REPAIRS);
}

/**
 * One extra repair pass over the wider defect table.
 * Returns undefined when no rule changed the text.
 */
export function suggestRepair(sql: string): string | undefined {
  const repaired = applyRepairs(sql, DEFECT_REPAIRS);
  return repaired === sql ? undefined : repaired;
}
