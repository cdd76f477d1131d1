// Entry point for the three-body simulator
import { SimulationApp } from './core/SimulationApp.js';
import { isDebugEnabled, readOverrides } from './core/Settings.js';

console.log('Three-Body Simulation - Initializing...');

function startSimulation(): SimulationApp | null {
  const canvas = document.getElementById('simCanvas');
  if (!(canvas instanceof HTMLCanvasElement)) {
    console.error('Canvas element #simCanvas not found');
    return null;
  }

  try {
    const app = new SimulationApp(canvas, {
      overrides: readOverrides(),
      debug: isDebugEnabled(),
    });
    app.start();
    console.log('Simulation started.');
    return app;
  } catch (error) {
    console.error('Failed to start simulation:', error);
    return null;
  }
}

startSimulation();
