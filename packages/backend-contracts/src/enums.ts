/**
 * @module @pkbridge/backend-contracts/enums
 *
 * Daemon enumerations. Numeric values follow the daemon's ordering, so a
 * value can be used directly as a bit position in a {@link Bitfield}.
 *
 * Value 0 of every enumeration is the reserved "unknown" sentinel.
 */

/**
 * Package categories used for browsing.
 */
export enum Group {
  UNKNOWN = 0,
  ACCESSIBILITY,
  ACCESSORIES,
  ADMIN_TOOLS,
  COMMUNICATION,
  DESKTOP_GNOME,
  DESKTOP_KDE,
  DESKTOP_OTHER,
  DESKTOP_XFCE,
  EDUCATION,
  FONTS,
  GAMES,
  GRAPHICS,
  INTERNET,
  LEGACY,
  LOCALIZATION,
  MAPS,
  MULTIMEDIA,
  NETWORK,
  OFFICE,
  OTHER,
  POWER_MANAGEMENT,
  PROGRAMMING,
  PUBLISHING,
  REPOS,
  SECURITY,
  SERVERS,
  SYSTEM,
  VIRTUALIZATION,
  SCIENCE,
  DOCUMENTATION,
  ELECTRONICS,
  COLLECTIONS,
  VENDOR,
  NEWEST,
}

/**
 * Operation categories a backend may serve.
 */
export enum Role {
  UNKNOWN = 0,
  CANCEL,
  DEPENDS_ON,
  GET_DETAILS,
  GET_FILES,
  GET_PACKAGES,
  GET_REPO_LIST,
  REQUIRED_BY,
  GET_UPDATE_DETAIL,
  GET_UPDATES,
  INSTALL_FILES,
  INSTALL_PACKAGES,
  INSTALL_SIGNATURE,
  REFRESH_CACHE,
  REMOVE_PACKAGES,
  REPO_ENABLE,
  REPO_SET_DATA,
  RESOLVE,
  SEARCH_DETAILS,
  SEARCH_FILE,
  SEARCH_GROUP,
  SEARCH_NAME,
  UPDATE_PACKAGES,
  WHAT_PROVIDES,
  ACCEPT_EULA,
  DOWNLOAD_PACKAGES,
  GET_DISTRO_UPGRADES,
  GET_CATEGORIES,
  GET_OLD_TRANSACTIONS,
  UPGRADE_SYSTEM,
  REPAIR_SYSTEM,
  GET_DETAILS_LOCAL,
  GET_FILES_LOCAL,
  REPO_REMOVE,
}

/**
 * Query refinements. Every positive filter (even value from 2 up) is
 * immediately followed by its `NOT_` counterpart.
 */
export enum Filter {
  UNKNOWN = 0,
  NONE,
  INSTALLED,
  NOT_INSTALLED,
  DEVELOPMENT,
  NOT_DEVELOPMENT,
  GUI,
  NOT_GUI,
  FREE,
  NOT_FREE,
  VISIBLE,
  NOT_VISIBLE,
  SUPPORTED,
  NOT_SUPPORTED,
  BASENAME,
  NOT_BASENAME,
  NEWEST,
  NOT_NEWEST,
  ARCH,
  NOT_ARCH,
  SOURCE,
  NOT_SOURCE,
  COLLECTIONS,
  NOT_COLLECTIONS,
  APPLICATION,
  NOT_APPLICATION,
  DOWNLOADED,
  NOT_DOWNLOADED,
}

/**
 * State of a package as reported with each package item.
 */
export enum Info {
  UNKNOWN = 0,
  INSTALLED,
  AVAILABLE,
  LOW,
  ENHANCEMENT,
  NORMAL,
  BUGFIX,
  IMPORTANT,
  SECURITY,
  BLOCKED,
  DOWNLOADING,
  UPDATING,
  INSTALLING,
  REMOVING,
  CLEANUP,
  OBSOLETING,
  COLLECTION_INSTALLED,
  COLLECTION_AVAILABLE,
  FINISHED,
  REINSTALLING,
  DOWNGRADING,
  PREPARING,
  DECOMPRESSING,
  UNTRUSTED,
  TRUSTED,
  UNAVAILABLE,
  CRITICAL,
}

/**
 * Transaction status shown by the daemon while a job runs.
 */
export enum Status {
  UNKNOWN = 0,
  WAIT,
  SETUP,
  RUNNING,
  QUERY,
  INFO,
  REMOVE,
  REFRESH_CACHE,
  DOWNLOAD,
  INSTALL,
  UPDATE,
  CLEANUP,
  OBSOLETE,
  DEP_RESOLVE,
  SIG_CHECK,
  TEST_COMMIT,
  COMMIT,
  REQUEST,
  FINISHED,
  CANCEL,
  DOWNLOAD_REPOSITORY,
  DOWNLOAD_PACKAGELIST,
  DOWNLOAD_FILELIST,
  DOWNLOAD_CHANGELOG,
  DOWNLOAD_GROUP,
  DOWNLOAD_UPDATEINFO,
  REPACKAGING,
  LOADING_CACHE,
  SCAN_APPLICATIONS,
  GENERATE_PACKAGE_LIST,
  WAITING_FOR_LOCK,
  WAITING_FOR_AUTH,
  SCAN_PROCESS_LIST,
  CHECK_EXECUTABLE_FILES,
  CHECK_LIBRARIES,
  COPY_FILES,
  RUN_HOOK,
}

/**
 * Flags attached to state-changing transactions.
 */
export enum TransactionFlag {
  NONE = 0,
  ONLY_TRUSTED,
  SIMULATE,
  ONLY_DOWNLOAD,
  ALLOW_REINSTALL,
  JUST_REINSTALL,
  ALLOW_DOWNGRADE,
}

type NumericEnum = Record<string, string | number>;

/**
 * Every numeric member of an enum, in declaration order.
 */
export function enumValues<E extends NumericEnum>(enumObject: E): Array<Extract<E[keyof E], number>> {
  return Object.values(enumObject).filter(
    (value): value is Extract<E[keyof E], number> => typeof value === 'number'
  );
}

function kebab(key: string): string {
  return key.toLowerCase().replace(/_/g, '-');
}

function textOf(enumObject: NumericEnum, value: number): string {
  const key = enumObject[value];
  return typeof key === 'string' ? kebab(key) : 'unknown';
}

function fromText<E extends NumericEnum>(
  enumObject: E,
  text: string,
  toText: (value: Extract<E[keyof E], number>) => string,
  fallback: Extract<E[keyof E], number>
): Extract<E[keyof E], number> {
  return enumValues(enumObject).find((value) => toText(value) === text) ?? fallback;
}

export function roleToString(role: Role): string {
  return textOf(Role, role);
}

export function roleFromString(text: string): Role {
  return fromText(Role, text, roleToString, Role.UNKNOWN);
}

export function groupToString(group: Group): string {
  return textOf(Group, group);
}

export function groupFromString(text: string): Group {
  return fromText(Group, text, groupToString, Group.UNKNOWN);
}

export function infoToString(info: Info): string {
  return textOf(Info, info);
}

export function infoFromString(text: string): Info {
  return fromText(Info, text, infoToString, Info.UNKNOWN);
}

export function statusToString(status: Status): string {
  return textOf(Status, status);
}

export function transactionFlagToString(flag: TransactionFlag): string {
  return textOf(TransactionFlag, flag);
}

/**
 * Filter text uses `~` for negation and `devel` for development,
 * e.g. `installed`, `~installed`, `~devel`.
 */
export function filterToString(filter: Filter): string {
  const key = Filter[filter];
  if (typeof key !== 'string') {
    return 'unknown';
  }
  const negated = key.startsWith('NOT_');
  const base = kebab(negated ? key.slice(4) : key);
  const name = base === 'development' ? 'devel' : base;
  return negated ? `~${name}` : name;
}

export function filterFromString(text: string): Filter {
  return fromText(Filter, text, filterToString, Filter.UNKNOWN);
}

/**
 * The counterpart of a positive or negated filter, or `undefined` for
 * `UNKNOWN` and `NONE`.
 */
export function filterNegation(filter: Filter): Filter | undefined {
  if (filter < Filter.INSTALLED || Filter[filter] === undefined) {
    return undefined;
  }
  return filter % 2 === 0 ? filter + 1 : filter - 1;
}

/**
 * The positive form of a filter (`NOT_GUI` → `GUI`).
 */
export function filterBase(filter: Filter): Filter {
  return filter >= Filter.INSTALLED && filter % 2 === 1 ? filter - 1 : filter;
}
