/**
 * Property-based tests for the authorization decision functions.
 *
 * **Property: Union of held roles**
 * A user holds a permission iff at least one of their roles grants it,
 * and adding a role never takes a permission away.
 */
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  hasAllPermissions,
  hasAnyPermission,
  hasPermission,
  hasRole,
} from './decisionEngine.js';
import { principalArb, requirementArb, roleNameArb } from '../test/arbitraries.js';
import { makeUser } from '../test/fixtures.js';

describe('Decision engine properties', () => {
  it('denies everything to a user with no roles', () => {
    fc.assert(
      fc.property(requirementArb, roleNameArb, (r, roleName) => {
        const user = makeUser({ roles: [] });

        expect(hasPermission(user, r.action, r.resource)).toBe(false);
        expect(hasRole(user, roleName)).toBe(false);
      }),
      { numRuns: 100 },
    );
  });

  it('grants exactly the pairs some held role carries', () => {
    fc.assert(
      fc.property(principalArb, requirementArb, (user, r) => {
        const granted = user.roles.some((role) =>
          role.permissions.some((p) => p.action === r.action && p.resource === r.resource),
        );

        expect(hasPermission(user, r.action, r.resource)).toBe(granted);
      }),
      { numRuns: 200 },
    );
  });

  it('never loses a permission when a role is added', () => {
    fc.assert(
      fc.property(principalArb, principalArb, requirementArb, (user, other, r) => {
        const widened = makeUser({ roles: [...user.roles, ...other.roles] });

        if (hasPermission(user, r.action, r.resource)) {
          expect(hasPermission(widened, r.action, r.resource)).toBe(true);
        }
      }),
      { numRuns: 200 },
    );
  });

  it('any/all agree with hasPermission over the list', () => {
    fc.assert(
      fc.property(
        principalArb,
        fc.array(requirementArb, { maxLength: 5 }),
        (user, requirements) => {
          const each = requirements.map((r) => hasPermission(user, r.action, r.resource));

          expect(hasAnyPermission(user, requirements)).toBe(each.some(Boolean));
          expect(hasAllPermissions(user, requirements)).toBe(each.every(Boolean));
        },
      ),
      { numRuns: 200 },
    );
  });
});
