import Bottleneck from "bottleneck";

/**
 * One request at a time against the news site,
 * at least 1s apart.
 */
export const siteLimiter = new Bottleneck({
  maxConcurrent: 1,
  minTime: 1_000,
});
