/**
 * Shared ontology texts for the test suites.
 */

// Hamlet's relationship points at Shakespeare before Shakespeare is declared.
export const LITERATURE = `format-version: 1.2
default-namespace: literature
remark: Sample literature ontology

[Typedef]
id: has_written
name: has written
inverse_of: written_by

[Typedef]
id: written_by
name: written by
inverse_of: has_written

[Term]
id: LIT:0000001
name: Literature form

[Term]
id: LIT:0000002
name: Drama
is_a: LIT:0000001 ! Literature form

[Term]
id: LIT:0000003
name: Hamlet
is_a: LIT:0000002 ! Drama
relationship: written_by LIT:0000005 ! Shakespeare

[Term]
id: LIT:0000004
name: Playwright

[Term]
id: LIT:0000005
name: Shakespeare
is_a: LIT:0000004 ! Playwright
`;

export const IDS = {
    literatureForm: 'LIT:0000001',
    drama: 'LIT:0000002',
    hamlet: 'LIT:0000003',
    playwright: 'LIT:0000004',
    shakespeare: 'LIT:0000005',
} as const;

// Diamond: D is_a B, D is_a C, B and C is_a A; E is_a D
export const DIAMOND = `format-version: 1.2

[Term]
id: X:A
name: a

[Term]
id: X:B
name: b
is_a: X:A

[Term]
id: X:C
name: c
is_a: X:A

[Term]
id: X:D
name: d
is_a: X:B
is_a: X:C

[Term]
id: X:E
name: e
is_a: X:D
`;
