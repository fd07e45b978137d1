// Core type definitions for datcom

// Place Resolution
export type PlaceResolution =
  | {
      status: 'found';
      place: string;
      dcid: string;
      dominantType?: string;
      candidates: string[];
    }
  | {
      status: 'not_found';
      place: string;
    };

// Variable Catalog
export interface PlaceVariables {
  dcid: string;
  variables: string[];
  /** Number of variables the service reported before truncation */
  totalAvailable: number;
}

export interface VariableCatalog {
  limit: number;
  places: PlaceVariables[];
}

// Observations
export interface FacetInfo {
  facetId: string;
  importName?: string;
  provenanceUrl?: string;
  measurementMethod?: string;
  observationPeriod?: string;
  unit?: string;
}

export type ObservationValue = number | string;

export type PopulationRecord =
  | {
      status: 'observed';
      dcid: string;
      variable: string;
      date: string;
      value: ObservationValue;
      facet?: FacetInfo;
    }
  | {
      status: 'missing';
      dcid: string;
      variable: string;
      requestedDate: string;
    };

export interface PopulationReport {
  variable: string;
  requestedDate: string;
  records: PopulationRecord[];
}

// LLM Chat
export interface ChatToolSchema {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface ChatToolCall {
  id: string;
  name: string;
  /** Raw JSON argument string as produced by the model */
  arguments: string;
}

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string | null; toolCalls?: ChatToolCall[] }
  | { role: 'tool'; toolCallId: string; content: string };

export interface ChatOptions {
  messages: ChatMessage[];
  tools?: ChatToolSchema[];
  maxTokens?: number;
  temperature?: number;
}

export interface ChatCompletion {
  content: string | null;
  toolCalls: ChatToolCall[];
}

export interface ChatProvider {
  chat(options: ChatOptions): Promise<ChatCompletion>;
}
