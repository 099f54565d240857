import { ArticleFields } from "./article";

export type RelevanceVerdict = "yes" | "no" | "unclear";

export interface RelevanceClassifier {
  classify(fields: ArticleFields): Promise<RelevanceVerdict>;
}
