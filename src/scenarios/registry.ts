import { AsteroidSize } from '../engine/types';
import type { ScenarioDefinition } from '../engine/types';

export interface ScenarioInfo {
  id: string;
  description: string;
  definition: ScenarioDefinition;
}

export const SCENARIOS: ScenarioInfo[] = [
  {
    id: 'default',
    description: 'Three huge asteroids at random positions',
    definition: { name: 'Default', numAsteroids: 3, asteroidSize: AsteroidSize.Huge },
  },
  {
    id: 'crossing',
    description: 'Two large asteroids crossing in front of the ship',
    definition: {
      name: 'Crossing',
      asteroids: [
        { position: { x: 100, y: 600 }, size: AsteroidSize.Large, heading: 270 },
        { position: { x: 700, y: 200 }, size: AsteroidSize.Large, heading: 90 },
      ],
    },
  },
  {
    id: 'ring',
    description: 'Eight medium asteroids drifting inward from a ring',
    definition: {
      name: 'Ring',
      asteroids: [
        { position: { x: 400, y: 700 }, size: AsteroidSize.Medium, heading: 180 },
        { position: { x: 612, y: 612 }, size: AsteroidSize.Medium, heading: 135 },
        { position: { x: 700, y: 400 }, size: AsteroidSize.Medium, heading: 90 },
        { position: { x: 612, y: 188 }, size: AsteroidSize.Medium, heading: 45 },
        { position: { x: 400, y: 100 }, size: AsteroidSize.Medium, heading: 0 },
        { position: { x: 188, y: 188 }, size: AsteroidSize.Medium, heading: 315 },
        { position: { x: 100, y: 400 }, size: AsteroidSize.Medium, heading: 270 },
        { position: { x: 188, y: 612 }, size: AsteroidSize.Medium, heading: 225 },
      ],
    },
  },
  {
    id: 'sniper',
    description: 'One stationary small asteroid straight ahead',
    definition: {
      name: 'Sniper',
      asteroids: [{ position: { x: 400, y: 700 }, size: AsteroidSize.Small, speed: 0, heading: 0 }],
    },
  },
];

export function findScenario(id: string): ScenarioInfo | undefined {
  return SCENARIOS.find((s) => s.id === id);
}
