type TestFn = () => Promise<void> | void;

const tests: Array<{ name: string; fn: TestFn }> = [];

export function test(name: string, fn: TestFn): void {
  tests.push({ name, fn });
}

/** Runs tests in registration order; `filter` keeps names containing it. */
export async function runRegistered(filter?: string): Promise<void> {
  let passed = 0;
  const selected = filter ? tests.filter((t) => t.name.includes(filter)) : tests;
  for (const t of selected) {
    try {
      await t.fn();
      process.stdout.write(`[PASS] ${t.name}\n`);
      passed += 1;
    } catch (err) {
      process.stderr.write(`[FAIL] ${t.name}: ${err instanceof Error ? err.message : String(err)}\n`);
      throw err;
    }
  }
  process.stdout.write(`[OK] ${passed} tests passed\n`);
}
