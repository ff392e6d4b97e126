import fs from "node:fs";
import readline from "node:readline";
import { DatasetUnavailableError } from "@/server/errors";

/** GAF 2.x columns; `DB:Reference` is renamed so it can be used unquoted in SQL. */
export const gafColumns = [
  { name: "DB", description: "source database, e.g. UniProtKB" },
  { name: "DB_Object_ID", description: "identifier of the annotated gene product" },
  { name: "DB_Object_Symbol", description: "gene symbol, e.g. BRCA1" },
  { name: "Qualifier", description: "relation to the GO term, e.g. enables, involved_in, located_in, NOT|enables" },
  { name: "GO_ID", description: "GO term identifier, e.g. GO:0006281" },
  { name: "DB_Reference", description: "supporting reference(s), e.g. PMID:..." },
  { name: "Evidence", description: "GO evidence code, e.g. IDA, IEA" },
  { name: "With", description: "with/from field for some evidence codes" },
  { name: "Aspect", description: "P = biological process, F = molecular function, C = cellular component" },
  { name: "DB_Object_Name", description: "full gene product name" },
  { name: "Synonym", description: "pipe-separated synonyms" },
  { name: "DB_Object_Type", description: "protein, gene, ncRNA, ..." },
  { name: "Taxon", description: "taxon, e.g. taxon:9606" },
  { name: "Date", description: "annotation date, YYYYMMDD" },
  { name: "Assigned_By", description: "annotating database" },
  { name: "Annotation_Extension", description: "annotation extension" },
  { name: "Gene_Product_Form_ID", description: "gene product form identifier" },
] as const;

export type GafColumn = (typeof gafColumns)[number]["name"];

export const gafColumnNames: readonly GafColumn[] = gafColumns.map((column) => column.name);

export const evidenceCodes: Record<string, string> = {
  EXP: "Inferred from Experiment",
  IDA: "Inferred from Direct Assay",
  IPI: "Inferred from Physical Interaction",
  IMP: "Inferred from Mutant Phenotype",
  IGI: "Inferred from Genetic Interaction",
  IEP: "Inferred from Expression Pattern",
  ISS: "Inferred from Sequence or Structural Similarity",
  ISO: "Inferred from Sequence Orthology",
  ISA: "Inferred from Sequence Alignment",
  ISM: "Inferred from Sequence Model",
  IGC: "Inferred from Genomic Context",
  IBA: "Inferred from Biological aspect of Ancestor",
  IBD: "Inferred from Biological aspect of Descendant",
  IKR: "Inferred from Key Residues",
  IRD: "Inferred from Rapid Divergence",
  RCA: "Inferred from Reviewed Computational Analysis",
  TAS: "Traceable Author Statement",
  NAS: "Non-traceable Author Statement",
  IC: "Inferred by Curator",
  ND: "No biological Data available",
  IEA: "Inferred from Electronic Annotation",
  NR: "Not Recorded",
};

/** Splits one GAF line into exactly 17 fields; comment and blank lines give null. */
export function parseGafLine(line: string): string[] | null {
  if (!line.trim() || line.startsWith("!")) return null;
  const fields = line.replace(/\r$/, "").split("\t");
  const padded = gafColumnNames.map((_, index) => fields[index] ?? "");
  return padded;
}

export async function* readGafFile(filePath: string): AsyncGenerator<string[]> {
  try {
    await fs.promises.access(filePath, fs.constants.R_OK);
  } catch (error) {
    throw new DatasetUnavailableError(`GAF file is not readable: ${filePath}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const lines = readline.createInterface({
    input: fs.createReadStream(filePath, { encoding: "utf8" }),
    crlfDelay: Infinity,
  });

  try {
    for await (const line of lines) {
      const row = parseGafLine(line);
      if (row) yield row;
    }
  } catch (error) {
    throw new DatasetUnavailableError(`GAF file could not be read: ${filePath}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  } finally {
    lines.close();
  }
}

export function describeGafSchema(): string {
  return gafColumns.map((column) => `- ${column.name}: ${column.description}`).join("\n");
}
