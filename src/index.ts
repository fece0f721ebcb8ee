/**
 * kube-lineage - resolve and render the dependency lineage of cluster objects.
 */

export * from './core.js';
