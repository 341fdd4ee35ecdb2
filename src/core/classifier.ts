import fs from "fs";
import path from "path";
import { z } from "zod";

export type RiskLabel = "scam" | "safe";

export type LabelledText = {
  text: string;
  label: RiskLabel;
};

/** A statistical signal that can be blended into the lexical risk score. */
export interface RiskModel {
  /** Probability in [0,1] that the text is a scam message. */
  probability(text: string): number;
}

const seedSchema = z.array(
  z.object({
    text: z.string().min(1),
    label: z.enum(["scam", "safe"])
  })
);

export const DEFAULT_SEED_FILE = path.resolve(__dirname, "../../data/classifierSeed.json");

export function loadSeedExamples(file: string = DEFAULT_SEED_FILE): LabelledText[] {
  const raw = fs.readFileSync(file, "utf-8");
  return seedSchema.parse(JSON.parse(raw));
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 1);
}

type ClassStats = {
  documents: number;
  tokens: number;
  counts: Map<string, number>;
};

function emptyStats(): ClassStats {
  return { documents: 0, tokens: 0, counts: new Map<string, number>() };
}

/**
 * Multinomial naive Bayes with Laplace smoothing. Trained once at
 * construction; `probability` is pure afterwards.
 */
export class NaiveBayesModel implements RiskModel {
  private readonly stats: Record<RiskLabel, ClassStats> = {
    scam: emptyStats(),
    safe: emptyStats()
  };
  private readonly vocabulary = new Set<string>();

  constructor(examples: LabelledText[]) {
    for (const example of examples) {
      const bucket = this.stats[example.label];
      bucket.documents += 1;
      for (const token of tokenize(example.text)) {
        bucket.counts.set(token, (bucket.counts.get(token) ?? 0) + 1);
        bucket.tokens += 1;
        this.vocabulary.add(token);
      }
    }
  }

  private logLikelihood(label: RiskLabel, tokens: string[], totalDocuments: number): number {
    const bucket = this.stats[label];
    const vocabSize = Math.max(1, this.vocabulary.size);
    let score = Math.log((bucket.documents + 1) / (totalDocuments + 2));
    for (const token of tokens) {
      if (!this.vocabulary.has(token)) continue;
      const count = bucket.counts.get(token) ?? 0;
      score += Math.log((count + 1) / (bucket.tokens + vocabSize));
    }
    return score;
  }

  probability(text: string): number {
    const tokens = tokenize(text);
    const totalDocuments = this.stats.scam.documents + this.stats.safe.documents;
    const scam = this.logLikelihood("scam", tokens, totalDocuments);
    const safe = this.logLikelihood("safe", tokens, totalDocuments);
    return 1 / (1 + Math.exp(safe - scam));
  }
}
