import { describe, it, expect } from 'vitest';
import { loadValidator, validateJson } from '../agents/context/jsonValidation.js';
import type { NarrationResponse } from '../agents/NarratorAgent.js';
import tryJsonRepair from '../utils/jsonRepair.js';

const narration = loadValidator<NarrationResponse>('narration');

describe('validateJson', () => {
  it('accepts a response matching the schema', () => {
    const result = validateJson(narration, '{"narration":"The lamp gutters."}');
    expect(result).toEqual({ valid: true, parsed: { narration: 'The lamp gutters.' }, repaired: false });
  });

  it('repairs near-JSON before validating', () => {
    const result = validateJson(narration, "{narration: 'The lamp gutters.'}");
    expect(result.valid).toBe(true);
    expect(result.repaired).toBe(true);
  });

  it('returns path-aware errors for schema violations', () => {
    const result = validateJson(narration, '{"narration":"ok","beatTransition":{"order":0,"status":"later"}}');
    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.errors).toEqual(['/beatTransition/order must be >= 1', '/beatTransition/status must be equal to one of the allowed values']);
  });

  it('rejects entity names made only of whitespace', () => {
    const result = validateJson(narration, '{"narration":"ok","introduceNpc":{"name":"  "}}');
    expect(result.valid === false && result.errors).toEqual(['/introduceNpc/name must match pattern "\\S"']);
  });

  it('reports a missing required field against the root', () => {
    const result = validateJson(narration, '{"npcLines":[]}');
    expect(result.valid === false && result.errors).toEqual(["(root) must have required property 'narration'"]);
  });

  it('compiles the campaign plan schema', () => {
    const plan = loadValidator<{ title: string; acts: string[] }>('campaign-plan');
    expect(validateJson(plan, '{"title":"Salt & Ember","acts":[]}').valid).toBe(false);
    expect(validateJson(plan, '{"title":"Salt & Ember","acts":["Arrive"]}').valid).toBe(true);
  });
});

describe('tryJsonRepair', () => {
  it('fixes trailing commas and truncated objects', () => {
    expect(tryJsonRepair('{"a":1,}')).toBe('{"a":1}');
    expect(tryJsonRepair('{"a":')).not.toBeNull();
  });
});
