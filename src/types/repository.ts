/**
 * Resolver (build-tool side) and repository (engine side) types
 */

import type { InterProjectModule } from './module.js';

export interface Authentication {
  readonly user: string;
  readonly password: string;
  readonly realm?: string;
  readonly optional?: boolean;
}

/**
 * Repositories as declared by the build tool.
 */
export type Resolver =
  | { readonly kind: 'maven'; readonly name: string; readonly root: string }
  | { readonly kind: 'pattern'; readonly name: string; readonly pattern: string; readonly changing?: boolean }
  | { readonly kind: 'directory'; readonly name: string; readonly path: string }
  | { readonly kind: 'url'; readonly name: string; readonly url: string };

/**
 * Engine-native repository representation.
 */
export type Repository =
  | {
      readonly kind: 'maven';
      readonly id: string;
      readonly root: string;
      readonly authentication?: Authentication;
    }
  | {
      readonly kind: 'pattern';
      readonly id: string;
      readonly pattern: string;
      readonly withChecksums: boolean;
      readonly withSignatures: boolean;
      readonly withArtifacts: boolean;
      readonly changing?: boolean;
      readonly authentication?: Authentication;
    }
  | {
      readonly kind: 'directory';
      readonly id: string;
      readonly root: string;
    }
  | {
      readonly kind: 'inter-project';
      readonly id: string;
      readonly projects: ReadonlyArray<InterProjectModule>;
    };
