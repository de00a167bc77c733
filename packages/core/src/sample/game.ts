import type { GameConfig } from '../models';

export function createSampleGameConfig(): GameConfig {
  return {
    levels: {
      level1: { level1: ['attacker'] },
      level2: { level2: ['attacker', 'webserver'] },
      level3: { level3: ['attacker', 'webserver'] },
      level4: {
        level4a: ['attacker', 'database'],
        level4b: ['attacker', 'fileserver'],
        level4c: ['attacker', 'fileserver', 'client'],
      },
      level5: { level5: ['attacker', 'client'] },
    },
    hints: {
      level1: {
        level1: {
          scan: 'Scan the local network for live hosts.',
          ports: 'Look closely at the open ports of the web server.',
        },
      },
      level4: {
        level4a: { query: 'The search form passes its input straight to the database.' },
        level4b: { share: 'One of the shares allows anonymous access.' },
      },
    },
    flags: {
      level1: 'flag-level-1',
      level2: 'flag-level-2',
      level3: 'flag-level-3',
      level4: 'flag-level-4',
      level5: 'flag-level-5',
    },
    requirements: {
      level4: [
        { branch: 'level4a', requirements: null },
        { branch: 'level4b', requirements: { timeLimit: 1200, skill: 'sqlmap' } },
        { branch: 'level4c', requirements: { timeLimit: 600, skill: 'metasploit' } },
      ],
    },
    skills: ['nmap', 'sqlmap', 'metasploit', 'hydra'],
  };
}
