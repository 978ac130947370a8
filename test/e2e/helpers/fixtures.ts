/**
 * Fixture factories for E2E tests.
 *
 * Every factory returns a fresh object with unique values (using a counter)
 * and accepts overrides so individual tests can tweak fields.
 */

let counter = 0;

function nextId(): number {
  return ++counter;
}

/** Reset the counter between test suites if needed. */
export function resetFixtureCounter(): void {
  counter = 0;
}

// ────────────────────── Signup ──────────────────────

export interface SignupFixture {
  email?: string;
  metadata: Record<string, unknown>;
}

export function validSignup(overrides: Partial<SignupFixture> = {}): SignupFixture {
  const n = nextId();
  return {
    email: `listener${n}@example.test`,
    metadata: { username: `listener_${n}` },
    ...overrides,
  };
}

export function signupAs(username: string, extra: Record<string, unknown> = {}): SignupFixture {
  const n = nextId();
  return {
    email: `member${n}@example.test`,
    metadata: { username, ...extra },
  };
}

// ────────────────────── Rooms ──────────────────────

export function validRoom(overrides: { title?: string } = {}): { title: string } {
  return { title: `Room ${nextId()}`, ...overrides };
}
