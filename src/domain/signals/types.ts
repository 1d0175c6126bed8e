// Signal Matching Types

export type SignalTargetKind = "pack" | "obligation";

export interface SignalTarget {
  kind: SignalTargetKind;
  id: string;
}

export interface SignalEntry {
  keyword: string; // lowercase, may span several words
  target: SignalTarget;
  weight: number; // (0, 1]
}

export interface ExplainEntry {
  keyword: string;
  matched_target: string;
  target_kind: SignalTargetKind;
  weight: number;
}

export interface PackSelection {
  pack_id: string;
  score: number;
  matched: string[]; // keywords, strongest first
}

export interface SelectedObligation {
  obligation_id: string;
  via: string[]; // pack ids, or "signal" when selected by its own score
}

export interface SelectionResult {
  packs: PackSelection[];
  obligations: SelectedObligation[];
  used_default: boolean;
  warnings: string[];
}
