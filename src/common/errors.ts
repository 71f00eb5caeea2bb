/** A required input table was not present in any of the searched directories. */
export class TableNotFoundError extends Error {
  readonly fileName: string;
  readonly searched: readonly string[];

  constructor(fileName: string, searched: readonly string[]) {
    super(`Could not find ${fileName} in ${searched.join(", ")}`);
    this.name = "TableNotFoundError";
    this.fileName = fileName;
    this.searched = searched;
  }
}
