/**
 * Repository Classifier Port
 *
 * Tells the discovery resolver what kind of git repository, if any,
 * lives at a directory.
 */

import type { RepositoryClassification } from "../entities";

export interface RepositoryClassifier {
  /**
   * Classify a directory.
   * A bare repository reports the names of its linked worktrees.
   */
  classify(dirpath: string): Promise<RepositoryClassification>;
}
