import { z } from "zod";
import type { ResearchMode, SourceType } from "./types.js";

export const probeChainNames = [
  "accountChooser",
  "verifyNext",
  "notebookCards",
  "notebookByTitle",
  "createNotebook",
  "notebookNameInput",
  "createConfirm",
  "notebookDeleteMenuItem",
  "notebookDeleteConfirm",
  "fileInput",
  "uploadTrigger",
  "audioOverview",
  "audioGenerate",
  "audioDownload",
  "chatInput",
  "sourceSearchModeInput",
  "searchInput",
  "pendingResults",
  "viewResults",
  "discardResults",
  "discardConfirm",
  "addSource",
  "sourceTypeMenu",
  "sourceTypeOption:web",
  "sourceTypeOption:drive",
  "sourceTypeOption:youtube",
  "sourceTypeOption:link",
  "researchModeMenu",
  "researchModeOption:fast",
  "researchModeOption:deep",
  "searchSubmit",
  "searchLoading",
  "searchCompleteBanner",
  "searchResultTitles",
  "searchResultRows",
  "searchResultPanel",
  "searchResultByTitle",
  "importResult",
  "removeResult",
  "generationInProgress",
  "generationLoading",
  "responseMessages",
  "chatArea",
  "saveAsNote",
  "addNote",
  "noteInput",
  "noteSave",
  "sourceItems",
  "sourcePanel",
  "sourceByTitle",
  "sourceDeleteMenuItem",
  "sourceDeleteConfirm",
  "sourceDeleteIcon",
  "sourceTypeLabel",
  "sourcePreview",
  "sourceLink",
  "chatMessages"
] as const;

export type ProbeChainName = (typeof probeChainNames)[number];

export function sourceTypeChainName(type: SourceType): ProbeChainName {
  return `sourceTypeOption:${type}`;
}

export function researchModeChainName(mode: ResearchMode): ProbeChainName {
  return `researchModeOption:${mode}`;
}

const probeSpecSchema = z.object({
  label: z.string().min(1).optional(),
  selector: z.string().min(1),
  hasText: z.string().min(1).optional(),
  pick: z.enum(["first", "last"]).optional(),
  state: z.enum(["visible", "attached"]).optional()
});

const probeChainSchema = z.array(probeSpecSchema).min(1);

const wordListSchema = z.array(z.string().min(1));

export const noiseSchema = z.object({
  notebookTitles: wordListSchema,
  notebookDatePattern: z.string().min(1),
  sourceLabels: wordListSchema,
  sourcePrompts: wordListSchema,
  searchResultLines: wordListSchema,
  resultTitleHints: wordListSchema,
  resultTypeTokens: wordListSchema,
  resultPanelLines: wordListSchema,
  historyFragments: wordListSchema,
  historyLines: wordListSchema,
  pendingResponseMarkers: wordListSchema,
  verifyPrompts: wordListSchema,
  signInHosts: wordListSchema
});

export const probeCatalogSchema = z
  .object({
    version: z.literal(1),
    chains: z.record(z.string(), probeChainSchema),
    noise: noiseSchema
  })
  .superRefine((catalog, context) => {
    for (const name of probeChainNames) {
      if (!(name in catalog.chains)) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["chains", name],
          message: `Missing probe chain '${name}'`
        });
      }
    }
  });

export type ParsedProbeCatalog = z.infer<typeof probeCatalogSchema>;
export type NoiseLists = z.infer<typeof noiseSchema>;

export function parseProbeCatalog(raw: unknown): ParsedProbeCatalog {
  return probeCatalogSchema.parse(raw);
}
