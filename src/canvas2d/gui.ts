import GUI from 'lil-gui';
import Stats from 'stats-gl';
import type { FlowConfig } from '../types.ts';

export interface GuiCallbacks {
  onReset?: () => void;
}

export interface GuiSetup {
  gui: GUI;
  stats: Stats;
}

const INTERACTIONS = [
  'Click: Start / Sail Again',
  'Drag: Steer Boat or Spray',
  'Right Click: Spawn Burst',
  'Arrows / WASD: Turn & Thrust',
  'Space: Debug View',
  'R: Restart, Esc: Quit',
];

/**
 * Builds the control panel. Rates are read by the simulation every tick, so
 * sliders apply immediately; population and seed changes need a reset.
 */
export function setupGui(config: FlowConfig, callbacks: GuiCallbacks = {}): GuiSetup {
  const gui = new GUI({ title: 'Drift Field' });

  const stats = new Stats({ trackGPU: false, horizontal: true });
  stats.domElement.style.position = 'fixed';
  stats.domElement.style.bottom = '10px';
  stats.domElement.style.left = '10px';
  stats.domElement.style.display = 'none';
  document.body.appendChild(stats.domElement);
  const uiState = {
    showStats: false,
    reset: () => callbacks.onReset?.(),
  };

  const flowFolder = gui.addFolder('Flow');
  flowFolder.add(config, 'gridSmoothing', 0.01, 1, 0.01).name('Grid Smoothing');
  flowFolder.add(config, 'particleRelax', 0, 0.5, 0.005).name('Particle Relax');
  flowFolder.add(config, 'particleCount', 0, 2000, 1).name('Start Particles').onFinishChange(uiState.reset);

  const interactionFolder = gui.addFolder('Interaction');
  interactionFolder.add(config, 'dragTarget', ['agent', 'particles']).name('Drag Target');
  interactionFolder.add(config, 'trackRate', 0.01, 1, 0.01).name('Track Rate');
  interactionFolder.add(config, 'dragGain', 0, 1, 0.01).name('Drag Gain');
  interactionFolder.add(config, 'pullRate', 0, 0.5, 0.005).name('Pull Rate');
  interactionFolder.add(config, 'pullRadius', 0, 400, 1).name('Pull Radius (0 = all)');
  interactionFolder.add(config, 'spawnOnDrag').name('Spawn On Drag');
  interactionFolder.add(config, 'spawnBurst', 0, 100, 1).name('Spawn Burst');
  interactionFolder.add(config, 'spawnBurstSpeed', 0, 5, 0.1).name('Burst Speed');
  interactionFolder.add(config, 'spawnSpread', 0, Math.PI * 2, 0.01).name('Spawn Spread');

  const agentFolder = gui.addFolder('Boat');
  agentFolder.add(config, 'agentCoupling', ['independent', 'field']).name('Coupling');
  agentFolder.add(config, 'turnRate', 0, 0.3, 0.005).name('Turn Rate');
  agentFolder.add(config, 'thrustBase', 0, 1, 0.01).name('Thrust Base');
  agentFolder.add(config, 'thrustRate', 0, 1, 0.01).name('Thrust Rate');
  agentFolder.add(config, 'hullStress', 0, 0.01, 0.0001).name('Hull Stress');
  agentFolder.close();

  const sessionFolder = gui.addFolder('Session');
  sessionFolder.add(config, 'victoryDistance', 0, 50000, 100).name('Victory Distance');
  sessionFolder.add(config, 'timeLimitFrames', 0, 36000, 60).name('Time Limit (frames)');
  sessionFolder.add(config, 'restartInto', ['running', 'notStarted']).name('Restart Into');
  sessionFolder.add(uiState, 'reset').name('Reset Session');
  sessionFolder.close();

  const performanceFolder = gui.addFolder('Performance');
  performanceFolder
    .add(uiState, 'showStats')
    .name('Show FPS')
    .onChange((value: boolean) => {
      stats.domElement.style.display = value ? 'block' : 'none';
    });
  performanceFolder.close();

  const helpFolder = gui.addFolder('Controls');
  const helpState = Object.fromEntries(INTERACTIONS.map((line, i) => [`k${i}`, line]));
  for (const key of Object.keys(helpState)) {
    helpFolder.add(helpState, key).name('').disable();
  }
  helpFolder.close();

  return { gui, stats };
}
