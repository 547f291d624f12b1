import { z } from "zod";
import catalogJson from "../data/diseases.json";

/** Classes in the order the image and symptom models emit their scores. */
export const DISEASE_CLASSES = ["Cercospora", "Healthy", "Miner", "Phoma", "Rust"] as const;

export type DiseaseName = (typeof DISEASE_CLASSES)[number];

export const NOT_COFFEE_LEAF = "Not Coffee Leaf" as const;

export type PredictedLabel = DiseaseName | typeof NOT_COFFEE_LEAF;

export type SeverityLevel = "Very High" | "High" | "Medium" | "Low" | "Very Low";

export function isDiseaseName(value: string): value is DiseaseName {
  return (DISEASE_CLASSES as readonly string[]).includes(value);
}

export function determineSeverityLevel(confidence: number): SeverityLevel {
  if (confidence >= 0.9) return "Very High";
  if (confidence >= 0.8) return "High";
  if (confidence >= 0.7) return "Medium";
  if (confidence >= 0.6) return "Low";
  return "Very Low";
}

const guidanceSchema = z.object({
  description: z.string().min(1),
  treatment: z.string().min(1),
});

const catalogSchema = z.object({
  classes: z.array(guidanceSchema.extend({ name: z.string() })),
  unknown: guidanceSchema,
  notCoffeeLeaf: guidanceSchema,
});

export type DiseaseGuidance = z.infer<typeof guidanceSchema>;

export class DiseaseCatalog {
  private readonly byName = new Map<string, DiseaseGuidance>();
  private readonly unknown: DiseaseGuidance;
  private readonly notCoffeeLeaf: DiseaseGuidance;

  constructor(raw: unknown = catalogJson) {
    const parsed = catalogSchema.parse(raw);
    for (const entry of parsed.classes) {
      this.byName.set(entry.name, { description: entry.description, treatment: entry.treatment });
    }
    this.unknown = parsed.unknown;
    this.notCoffeeLeaf = parsed.notCoffeeLeaf;
  }

  guidanceFor(label: string): DiseaseGuidance {
    if (label === NOT_COFFEE_LEAF) return this.notCoffeeLeaf;
    return this.byName.get(label) ?? this.unknown;
  }
}
