// Month names accepted in "<day> <month> <year>" dates, English and Bulgarian, full and abbreviated
const MONTHS: ReadonlyArray<readonly string[]> = [
  ['january', 'jan', 'януари', 'яну'],
  ['february', 'feb', 'февруари', 'фев'],
  ['march', 'mar', 'март', 'мар'],
  ['april', 'apr', 'април', 'апр'],
  ['may', 'май'],
  ['june', 'jun', 'юни'],
  ['july', 'jul', 'юли'],
  ['august', 'aug', 'август', 'авг'],
  ['september', 'sep', 'sept', 'септември', 'сеп', 'септ'],
  ['october', 'oct', 'октомври', 'окт'],
  ['november', 'nov', 'ноември', 'ное'],
  ['december', 'dec', 'декември', 'дек']
];

const MONTH_LOOKUP = new Map<string, number>(
  MONTHS.flatMap((names, index) => names.map((name): [string, number] => [name, index + 1]))
);

export const lookupMonth = (name: string): number | null => {
  const normalized = name.trim().toLowerCase().replace(/\.$/, '');
  return MONTH_LOOKUP.get(normalized) ?? null;
};
