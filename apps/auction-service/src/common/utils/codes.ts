import { randomInt } from 'crypto';
import { ConflictError } from '@gemhouse/shared';

const MAX_ATTEMPTS = 5;

export const JEWELRY_CODE = { prefix: 'JWL', digits: 7 } as const;
export const SESSION_CODE = { prefix: 'AUC', digits: 5 } as const;

export function generateCode(prefix: string, digits: number): string {
  const n = randomInt(0, 10 ** digits);
  return `${prefix}${n.toString().padStart(digits, '0')}`;
}

export async function allocateCode(
  format: { prefix: string; digits: number },
  exists: (code: string) => Promise<boolean>,
): Promise<string> {
  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    const code = generateCode(format.prefix, format.digits);
    if (!(await exists(code))) {
      return code;
    }
  }
  throw new ConflictError(`Could not allocate a unique ${format.prefix} code`, 'CODE_EXHAUSTED');
}
