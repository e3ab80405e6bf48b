/**
 * jailprof Profile Host — Profile Name Completion
 *
 * Users name profiles the way the sandbox does: `firefox` means
 * `firefox.profile`, and a handful of frequently included files have
 * shortnames (`dc` for `disable-common.inc`).
 */

/** Shortnames of commonly included files. */
export const SHORTNAMES: Readonly<Record<string, string>> = {
  acd: 'allow-common-devel.inc',
  ag: 'allow-gjs.inc',
  aj: 'allow-java.inc',
  al: 'allow-lua.inc',
  ap: 'allow-perl.inc',
  ap2: 'allow-python2.inc',
  ap3: 'allow-python3.inc',
  ar: 'allow-ruby.inc',
  dc: 'disable-common.inc',
  dd: 'disable-devel.inc',
  de: 'disable-exec.inc',
  di: 'disable-interpreters.inc',
  dp: 'disable-programs.inc',
  dpm: 'disable-passwdmgr.inc',
  ds: 'disable-shell.inc',
  dx: 'disable-xdg.inc',
  wc: 'whitelist-common.inc',
  wruc: 'whitelist-runuser-common.inc',
  wusc: 'whitelist-usr-share-common.inc',
  wvc: 'whitelist-var-common.inc',
};

const PROFILE_EXTENSIONS = ['.profile', '.local', '.inc'] as const;

/**
 * A profile name that cannot name a file in a search directory.
 */
export class ProfileNameError extends Error {
  readonly profileName: string;

  constructor(profileName: string, reason: string) {
    super(`Invalid profile name '${profileName}': ${reason}`);
    this.name = 'ProfileNameError';
    this.profileName = profileName;
  }
}

/** True if `name` is a path rather than a bare profile name. */
export function isProfilePath(name: string): boolean {
  return name.includes('/');
}

/**
 * Complete a profile name to the file name looked up in the search
 * directories.
 *
 * @example
 * completeName('firefox')       // 'firefox.profile'
 * completeName('dc')            // 'disable-common.inc'
 * completeName('globals.local') // 'globals.local'
 *
 * @throws {ProfileNameError} If `name` contains `/`, is empty, or is `.` / `..`
 */
export function completeName(name: string): string {
  if (isProfilePath(name)) {
    throw new ProfileNameError(name, "profile names must not contain '/'");
  }
  if (name === '' || name === '.' || name === '..') {
    throw new ProfileNameError(name, "profile names must not be empty, '.' or '..'");
  }

  if (Object.prototype.hasOwnProperty.call(SHORTNAMES, name)) {
    return SHORTNAMES[name] ?? name;
  }
  if (PROFILE_EXTENSIONS.some((extension) => name.endsWith(extension))) {
    return name;
  }
  return `${name}.profile`;
}
