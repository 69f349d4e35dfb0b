/**
 * Sheet row builders for the three workbook layouts.
 * Rows are raw cell strings; the scanner pads them to the layout width.
 */

type Row = string[];
type Cell = string | number;

const cells = (values: readonly Cell[]): string[] => values.map(String);

export const GRAND_TOTAL_LABEL = 'Ընդամենը';
export const PROGRAM_ACTIVITIES_LABEL = 'Ծրագրի միջոցառումներ';
export const PROGRAM_GOAL_LABEL = 'Ծրագրի նպատակը';
export const PROGRAM_RESULT_LABEL = 'Վերջնական արդյունքի նկարագրությունը';
export const SUBPROGRAM_DESC_LABEL = 'Միջոցառման նկարագրությունը';
export const SUBPROGRAM_TYPE_LABEL = 'Միջոցառման տեսակը';

// ─────────────────────────────────────────────────────────────────────────────
// Legacy layout
// ─────────────────────────────────────────────────────────────────────────────

export const legacy = {
  grandTotal: (...amounts: Cell[]): Row => ['', '', GRAND_TOTAL_LABEL, ...cells(amounts)],
  stateBody: (name: string, ...amounts: Cell[]): Row => ['', '', name, ...cells(amounts)],
  program: (code: Cell, title: string, ...amounts: Cell[]): Row => [
    String(code),
    '',
    title,
    ...cells(amounts),
  ],
  marker: (): Row => ['', '', PROGRAM_ACTIVITIES_LABEL],
  subprogram: (code: string, title: string, ...amounts: Cell[]): Row => [
    '',
    code,
    title,
    ...cells(amounts),
  ],
  detail: (text: string): Row => ['', '', text],
  programDetails: (name: string, goal: string, result: string): Row[] => [
    legacy.detail(name),
    legacy.detail(PROGRAM_GOAL_LABEL),
    legacy.detail(goal),
    legacy.detail(PROGRAM_RESULT_LABEL),
    legacy.detail(result),
  ],
  subprogramDetails: (name: string, description: string, type: string): Row[] => [
    legacy.detail(name),
    legacy.detail(SUBPROGRAM_DESC_LABEL),
    legacy.detail(description),
    legacy.detail(SUBPROGRAM_TYPE_LABEL),
    legacy.detail(type),
  ],
};

/**
 * Two state bodies, three programs, four subprograms; grand total 1,000,000.
 */
export const budgetLawSheet = (): Row[] => [
  legacy.grandTotal(1000000),
  legacy.stateBody('Ministry of Finance', 600000),
  legacy.program(1001, 'Public finance management', 600000),
  ...legacy.programDetails(
    'Public finance management',
    'Sustainable public finances',
    'Balanced budget execution'
  ),
  legacy.marker(),
  legacy.subprogram('11001', 'Budget planning', 400000),
  ...legacy.subprogramDetails('Budget planning', 'Preparation of the annual budget', 'Service'),
  legacy.subprogram('11002', 'Treasury operations', 200000),
  ...legacy.subprogramDetails('Treasury operations', 'Cash management', 'Service'),
  legacy.stateBody('Ministry of Health', 400000),
  legacy.program(1002, 'Primary care', 250000),
  ...legacy.programDetails('Primary care', 'Accessible primary care', 'More people served'),
  legacy.marker(),
  legacy.subprogram('12001', 'Primary care services', 250000),
  ...legacy.subprogramDetails('Primary care services', 'Clinic funding', 'Service'),
  legacy.program(1003, 'Public health', 150000),
  ...legacy.programDetails('Public health', 'Disease prevention', 'Higher vaccination rate'),
  legacy.marker(),
  legacy.subprogram('13001', 'Vaccination', 150000),
  ...legacy.subprogramDetails('Vaccination', 'National immunization calendar', 'Goods'),
];

/**
 * Quarterly spending report: annual, revised annual, period, revised period,
 * actual, and two execution rates stored as percentages.
 */
export const periodSpendingSheet = (): Row[] => [
  legacy.grandTotal(1000, 1200, 250, 300, 240, '20', '80%'),
  legacy.stateBody('Ministry of Finance', 1000, 1200, 250, 300, 240, '20', '80'),
  legacy.program(1001, 'Public finance management', 1000, 1200, 250, 300, 240, '20', '80'),
  ...legacy.programDetails('Public finance management', 'Sustainable public finances', 'Balance'),
  legacy.marker(),
  legacy.subprogram('11001', 'Budget planning', 1000, 1200, 250, 300, 240, '20', '80'),
  ...legacy.subprogramDetails('Budget planning', 'Annual budget', 'Service'),
];

// ─────────────────────────────────────────────────────────────────────────────
// 2025 layout
// ─────────────────────────────────────────────────────────────────────────────

export const layout2025 = {
  grandTotal: (total: Cell): Row => [GRAND_TOTAL_LABEL, '', '', '', '', '', String(total)],
  stateBody: (name: string, total: Cell): Row => [name, '', '', '', '', '', String(total)],
  program: (code: Cell, name: string, goal: string, result: string, total: Cell): Row => [
    '',
    String(code),
    '',
    name,
    goal,
    result,
    String(total),
  ],
  subprogram: (code: string, name: string, description: string, type: string, total: Cell): Row => [
    '',
    '',
    code,
    name,
    description,
    type,
    String(total),
  ],
};

export const budgetLaw2025Sheet = (): Row[] => [
  layout2025.grandTotal(500),
  layout2025.stateBody('Ministry of Justice', 500),
  layout2025.program(1201, 'Courts', 'Fair trials', 'Shorter case duration', 500),
  layout2025.subprogram('1201-11001', 'Court administration', 'Running the courts', 'Service', 300),
  layout2025.subprogram('1201-11002', 'Legal aid', 'Free legal assistance', 'Service', 200),
];

// ─────────────────────────────────────────────────────────────────────────────
// Expenditure plan layout
// ─────────────────────────────────────────────────────────────────────────────

export const plan = {
  grandTotal: (...totals: Cell[]): Row => ['', GRAND_TOTAL_LABEL, ...cells(totals)],
  stateBody: (name: string, ...totals: Cell[]): Row => ['', name, ...cells(totals)],
  program: (code: Cell, title: string, ...totals: Cell[]): Row => [
    String(code),
    title,
    ...cells(totals),
  ],
  detail: (text: string): Row => ['', text],
};

export const expenditurePlanSheet = (): Row[] => [
  plan.grandTotal(300, 330, 360),
  plan.stateBody('Ministry of Education', 300, 330, 360),
  plan.program(1101, 'Schooling', 200, 220, 240),
  plan.detail('Preschool and general education'),
  plan.detail(PROGRAM_GOAL_LABEL),
  plan.detail('Universal access'),
  plan.detail(PROGRAM_RESULT_LABEL),
  plan.detail('Higher enrolment'),
  plan.program(1102, 'Vocational training', 100, 110, 120),
];
