/**
 * Peer state transitions
 */

export const PEER_STATES = {
  ABSENT: 'absent',
  JOINED: 'joined',
  ACTIVE: 'active',
  DEPARTED: 'departed',
} as const;

export type PeerState = (typeof PEER_STATES)[keyof typeof PEER_STATES];

export interface PeerTransition {
  from: PeerState;
  to: PeerState;
  condition?: string;
}

const VALID_TRANSITIONS: PeerTransition[] = [
  { from: PEER_STATES.ABSENT, to: PEER_STATES.JOINED, condition: 'relation_joined' },

  // A peer that joined but never published can leave again
  { from: PEER_STATES.JOINED, to: PEER_STATES.ACTIVE, condition: 'fragment_published' },
  { from: PEER_STATES.JOINED, to: PEER_STATES.DEPARTED, condition: 'relation_departed' },

  { from: PEER_STATES.ACTIVE, to: PEER_STATES.ACTIVE, condition: 'fragment_replaced' },
  { from: PEER_STATES.ACTIVE, to: PEER_STATES.DEPARTED, condition: 'relation_departed' },

  { from: PEER_STATES.DEPARTED, to: PEER_STATES.JOINED, condition: 'relation_rejoined' },
];

export class PeerTransitionValidator {
  private transitionMap: Map<PeerState, PeerTransition[]>;

  constructor() {
    this.transitionMap = new Map();

    for (const transition of VALID_TRANSITIONS) {
      const existing = this.transitionMap.get(transition.from) ?? [];
      existing.push(transition);
      this.transitionMap.set(transition.from, existing);
    }
  }

  isValidTransition(from: PeerState, to: PeerState): boolean {
    const transitions = this.transitionMap.get(from) ?? [];
    return transitions.some((t) => t.to === to);
  }

  getTransitionCondition(from: PeerState, to: PeerState): string | undefined {
    const transitions = this.transitionMap.get(from) ?? [];
    return transitions.find((t) => t.to === to)?.condition;
  }
}

export const peerTransitionValidator = new PeerTransitionValidator();
