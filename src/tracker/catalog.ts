// pattern: Functional Core

/**
 * Read-only lookup from review status code to the verdict shown to the user.
 */
export type StatusCatalog = {
  readonly verdictFor: (status: string) => string | null;
  readonly statuses: () => ReadonlyArray<string>;
};

export function createStatusCatalog(
  verdicts: Readonly<Record<string, string>>,
): StatusCatalog {
  const table: ReadonlyMap<string, string> = new Map(Object.entries(verdicts));

  return {
    verdictFor: (status) => table.get(status) ?? null,
    statuses: () => [...table.keys()],
  };
}
