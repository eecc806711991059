/**
 * Who the boot sequence is about
 *
 * Everything shown in the BIOS banner, the login and the fetch summary apart
 * from the GitHub stats, which are fetched for `general.user_name` in
 * settings.jsonc.
 */
import type { Profile } from './src/types.ts'

export default {
  displayName: 'ada',
  hostName: 'retro-os',
  osName: 'RETRO_OS',
  osVersion: '4.2.0',
  logoText: 'RETRO OS',
  company: 'Analytical Engines Ltd.',
  role: 'Platform Engineer',
  location: 'Somewhere in the cloud',
  timeZone: 'Europe/London',
  birthday: { day: 10, month: 12, year: 1990 },
  os: 'Arch Linux x86_64',
  ide: 'neovim, VSCode',
  avatar: './avatar.png',
  avatarScale: 0.07,
  ignoreRepos: [],
  fonts: {
    text: { family: 'IosevkaTerm Nerd Font', size: 14, lineSpacing: 2 },
    logo: { family: 'VTKS Blocketo', size: 66, lineSpacing: 0 },
    files: ['./fonts/IosevkaTermNerdFont-Bold.ttf', './fonts/vtks-blocketo.regular.ttf'],
  },
  closingMessage: 'Thanks for stopping by! Have a great day :D',
} satisfies Profile
