/**
 * File mode overrides: an octal mode ('755', '0o644') or a chmod-style
 * symbolic expression ('u+x', 'go-w', 'a=r,u+w') applied on top of the
 * source file's mode.
 */

const OCTAL = /^(?:0o|0)?([0-7]{1,4})$/i;
const SYMBOLIC_CLAUSE = /^([ugoa]*)([+\-=])([rwxXst]*)$/;

const CLASS_SHIFT: Readonly<Record<'u' | 'g' | 'o', number>> = { u: 6, g: 3, o: 0 };

function classesOf(who: string): Array<'u' | 'g' | 'o'> {
  if (who === '' || who.includes('a')) return ['u', 'g', 'o'];
  const classes: Array<'u' | 'g' | 'o'> = [];
  if (who.includes('u')) classes.push('u');
  if (who.includes('g')) classes.push('g');
  if (who.includes('o')) classes.push('o');
  return classes;
}

function clauseBits(classes: ReadonlyArray<'u' | 'g' | 'o'>, perms: string, currentMode: number): { bits: number; mask: number } {
  let bits = 0;
  let mask = 0;
  const anyExecute = (currentMode & 0o111) !== 0;

  for (const cls of classes) {
    const shift = CLASS_SHIFT[cls];
    mask |= 0o7 << shift;
    if (perms.includes('r')) bits |= 0o4 << shift;
    if (perms.includes('w')) bits |= 0o2 << shift;
    if (perms.includes('x') || (perms.includes('X') && anyExecute)) bits |= 0o1 << shift;
    if (perms.includes('s') && cls === 'u') bits |= 0o4000;
    if (perms.includes('s') && cls === 'g') bits |= 0o2000;
  }
  if (perms.includes('t')) bits |= 0o1000;
  if (classes.includes('u')) mask |= 0o4000;
  if (classes.includes('g')) mask |= 0o2000;
  if (classes.includes('o')) mask |= 0o1000;

  return { bits, mask };
}

/**
 * Compute the mode that results from applying `override` to `mode`.
 * Throws on an expression that is neither octal nor symbolic.
 */
export function applyPermissions(mode: number, override: string | undefined): number {
  const base = mode & 0o7777;
  if (override === undefined || override.trim() === '') {
    return base;
  }

  const trimmed = override.trim();
  const octal = OCTAL.exec(trimmed);
  if (octal?.[1] !== undefined) {
    return parseInt(octal[1], 8);
  }

  let result = base;
  for (const clause of trimmed.split(',')) {
    const match = SYMBOLIC_CLAUSE.exec(clause.trim());
    if (!match) {
      throw new Error(`Invalid permissions "${override}"`);
    }
    const [, who = '', operator = '=', perms = ''] = match;
    const { bits, mask } = clauseBits(classesOf(who), perms, result);

    if (operator === '+') result |= bits;
    else if (operator === '-') result &= ~bits;
    else result = (result & ~mask) | bits;
  }
  return result & 0o7777;
}
