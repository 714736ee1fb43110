export { useViewStore } from './viewStore';
export type { ViewTab } from './viewStore';
export { useInteractionStore } from './interactionStore';
export type { Interaction, Selection } from './interactionStore';
export { useConnectionStore } from './connectionStore';
export type { PendingPick, PickOutcome } from './connectionStore';
export { connectStores } from './sync';
