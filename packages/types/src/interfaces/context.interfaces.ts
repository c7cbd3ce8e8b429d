/**
 * The authenticated user on whose behalf a service call runs.
 */
export interface ActorContext {
  userId: number;
}

/**
 * Actor plus the project every ticket operation is scoped to.
 */
export interface ProjectContext extends ActorContext {
  projectId: number;
}
