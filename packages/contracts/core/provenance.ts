// Known source types autocomplete; any other string is accepted
export type SourceId = "synthetic" | (string & {});
export type WorkerId = string;
