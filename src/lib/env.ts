/**
 * Augmented environment for execa calls.
 *
 * Shells started from editors or desktop launchers often miss the package
 * manager bin directories, which is where tmux, gh and the agent CLIs live.
 */

const extraDirs = [
  '/opt/homebrew/bin',
  '/opt/homebrew/sbin',
  '/usr/local/bin',
  '/home/linuxbrew/.linuxbrew/bin',
];

const home = process.env.HOME ?? '';
if (home) {
  extraDirs.push(`${home}/.local/bin`, `${home}/.nix-profile/bin`);
}

const augmentedPath = [...extraDirs, process.env.PATH].filter(Boolean).join(':');

export const execaEnv = {
  env: { PATH: augmentedPath },
};
