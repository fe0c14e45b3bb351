import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { formatZodIssues, fromZod } from '../zod-utils.js';

describe('fromZod', () => {
  const schema = z.object({ rate: z.number().min(0) });

  it('should return ok with parsed data', () => {
    expect(fromZod(schema, { rate: 0.0336 })._unsafeUnwrap()).toEqual({ rate: 0.0336 });
  });

  it('should return err with the zod error', () => {
    const result = fromZod(schema, { rate: -1 });

    expect(result.isErr()).toBe(true);
    expect(formatZodIssues(result._unsafeUnwrapErr())).toBe('rate: Number must be greater than or equal to 0');
  });

  it('should label root-level issues', () => {
    const result = fromZod(schema, 'nope');

    expect(formatZodIssues(result._unsafeUnwrapErr())).toBe('(root): Expected object, received string');
  });
});
