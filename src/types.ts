/**
 * Shared type definitions for the drift-field simulation.
 *
 * The simulation couples three things over unit ticks:
 * - a coarse grid of averaged flow vectors,
 * - a swarm of passive particles that both feed and follow the grid,
 * - one player-steered boat living in the same toroidal domain.
 */

/**
 * 2D vector representation used throughout the simulation.
 * Used for positions, velocities, offsets and other 2D quantities.
 */
export interface Vec2 {
  x: number;
  y: number;
}

/** Source of uniformly distributed numbers in [0, 1). */
export type Random = () => number;

/** What a pointer drag acts on. */
export type DragTarget = 'agent' | 'particles';

/** Whether the boat feeds and follows the flow grid like a particle. */
export type AgentCoupling = 'independent' | 'field';

/** Display flag read by the renderer only. */
export type DisplayMode = 'default' | 'debug';

/** Lifecycle phase of a play-through. */
export type SessionPhase = 'notStarted' | 'running' | 'over';

/** Phase entered after a finished session is started again. */
export type RestartPhase = Exclude<SessionPhase, 'over'>;

/**
 * Complete configuration for the simulation.
 * Rates are per-tick blend fractions in (0, 1).
 */
export interface FlowConfig {
  /** Domain width in pixels */
  width: number;

  /** Domain height in pixels */
  height: number;

  /** Number of flow cells along X */
  cellsX: number;

  /** Number of flow cells along Y */
  cellsY: number;

  /** Magnitude bound of the random vector each cell starts with */
  flowSeedMagnitude: number;

  /**
   * Fraction of the gap between a cell's stored flow and the current
   * frame's local average closed on every commit.
   */
  gridSmoothing: number;

  /** Fraction of the gap between a particle's velocity and its cell's flow closed per tick */
  particleRelax: number;

  /** Particles created at session start */
  particleCount: number;

  /** Magnitude bound of each initial particle velocity component */
  particleSpeed: number;

  /** Cosmetic particle size */
  particleSize: number;

  /** Boat start position */
  agentStart: Vec2;

  /** Boat start velocity */
  agentStartVelocity: Vec2;

  /** Boat health at session start */
  agentHealth: number;

  /** Radians turned per tick while a turn key is held */
  turnRate: number;

  /** Base thrust magnitude, added to the current speed */
  thrustBase: number;

  /** Fraction of the gap to the thrust vector closed per tick */
  thrustRate: number;

  /** Field coupling of the boat */
  agentCoupling: AgentCoupling;

  /** Fraction of the gap between the tracked point and the pointer closed per tick */
  trackRate: number;

  /** Scale from drag offset (pixels) to velocity (pixels per tick) */
  dragGain: number;

  /** What the primary drag steers */
  dragTarget: DragTarget;

  /** Blend rate used by the particle spray variant */
  pullRate: number;

  /** Spray radius around the pointer; 0 affects every particle */
  pullRadius: number;

  /** Spawn one particle per tick while dragging */
  spawnOnDrag: boolean;

  /** Particles spawned by one secondary-button press */
  spawnBurst: number;

  /** Speed added in a random direction to each burst particle */
  spawnBurstSpeed: number;

  /** Full width (radians) of the random cone spawned velocities are rotated within */
  spawnSpread: number;

  /** Health lost per unit of speed mismatch between the boat and the local flow */
  hullStress: number;

  /** Distance sailed that wins the session; 0 disables */
  victoryDistance: number;

  /** Ticks after which the session ends with the score; 0 disables */
  timeLimitFrames: number;

  /** Phase entered when a finished session is started again */
  restartInto: RestartPhase;

  /** Seed for the deterministic generator; null uses Math.random */
  seed: number | null;

  /** Length multiplier of each particle's velocity line */
  particleLineScale: number;

  /** Length multiplier of the per-cell flow vectors in debug mode */
  cellVectorScale: number;

  /** Boat hull length in pixels */
  hullLength: number;
}

/**
 * Snapshot of the input devices for one frame.
 *
 * `*Pressed` flags are edge-triggered: true only on the frame the button or
 * key went down. The remaining booleans report held state.
 */
export interface InputFrame {
  /** Pointer position in domain pixels */
  pointer: Vec2;

  /** Primary (drag) button held */
  dragDown: boolean;

  /** Primary button went down this frame */
  primaryPressed: boolean;

  /** Secondary (spawn) button went down this frame */
  spawnPressed: boolean;

  /** Display mode toggle key went down this frame */
  togglePressed: boolean;

  /** Quit key went down this frame */
  quitPressed: boolean;

  /** Restart key went down this frame */
  restartPressed: boolean;

  /** Turn-left key held */
  turnLeft: boolean;

  /** Turn-right key held */
  turnRight: boolean;

  /** Thrust key held */
  thrust: boolean;
}

/** Produces one input snapshot per frame and clears edge-triggered flags. */
export interface InputSource {
  poll: () => InputFrame;
}

/** Process control owned by the host. */
export interface Host {
  quit: () => void;
}
