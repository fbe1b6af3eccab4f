/** Sortable run id such as `20261018T120000Z-k3j9xq`; also names the run summary file. */
export function createRunId(now = new Date(), random: () => number = Math.random): string {
  const stamp = now.toISOString().replace(/\.\d{3}/, "").replace(/[-:]/g, "");
  const suffix = random().toString(36).slice(2, 8).padEnd(6, "0");
  return `${stamp}-${suffix}`;
}
