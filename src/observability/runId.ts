export function createRunId(command = "job", now = new Date(), random: () => number = Math.random): string {
  const suffix = random().toString(36).slice(2, 8).padEnd(6, "0");
  return `${command}_${now.toISOString().replace(/[:.]/g, "-")}_${suffix}`;
}
