/**
 * Descriptor and stream constants
 *
 * Open flags are read from the running platform (`fs.constants`) because
 * their numeric values differ between operating systems. A flag the platform
 * does not define has the value 0, which makes it inert when OR-ed into a
 * flag set; use {@link isOpenFlagSupported} to find out which ones are real.
 *
 * Permission bits, seek origins and stream sizes are fixed POSIX values.
 *
 * @see https://pubs.opengroup.org/onlinepubs/9699919799/functions/open.html
 * @see https://pubs.opengroup.org/onlinepubs/9699919799/basedefs/sys_stat.h.html
 *
 * @module core/constants
 */

import { constants as fsConstants } from 'node:fs'

const platformConstants = new Map<string, number>(Object.entries(fsConstants))

function platformFlag(name: string): number {
  return platformConstants.get(name) ?? 0
}

// =============================================================================
// File Open Flags (open())
// =============================================================================
// Combine with bitwise OR (|). Exactly one of O_RDONLY, O_WRONLY, O_RDWR.

/**
 * Open for reading only.
 * @example
 * ```typescript
 * const file = new RawFile('/data.bin', O_RDONLY)
 * ```
 */
export const O_RDONLY = platformFlag('O_RDONLY')

/** Open for writing only. */
export const O_WRONLY = platformFlag('O_WRONLY')

/** Open for reading and writing. */
export const O_RDWR = platformFlag('O_RDWR')

/** Do not block on open or on transfers (FIFOs, devices). */
export const O_NONBLOCK = platformFlag('O_NONBLOCK')

/**
 * Set append mode. Every write lands at the end of file, whatever the
 * descriptor offset was.
 */
export const O_APPEND = platformFlag('O_APPEND')

/**
 * Create file if it does not exist. The mode argument supplies its
 * permission bits.
 * @example
 * ```typescript
 * const file = new RawFile('/new.bin', O_WRONLY | O_CREAT, USER_READ_AND_WRITE)
 * ```
 */
export const O_CREAT = platformFlag('O_CREAT')

/** Truncate an existing regular file to length 0. */
export const O_TRUNC = platformFlag('O_TRUNC')

/** With O_CREAT, fail with EEXIST if the file already exists. */
export const O_EXCL = platformFlag('O_EXCL')

/** Atomically obtain a shared lock (BSD/macOS only). */
export const O_SHLOCK = platformFlag('O_SHLOCK')

/** Atomically obtain an exclusive lock (BSD/macOS only). */
export const O_EXLOCK = platformFlag('O_EXLOCK')

/** Fail with ELOOP if the final path component is a symbolic link. */
export const O_NOFOLLOW = platformFlag('O_NOFOLLOW')

/** Open the symbolic link itself rather than its target (macOS only). */
export const O_SYMLINK = platformFlag('O_SYMLINK')

/** Descriptor requested for event notifications only (macOS only). */
export const O_EVTONLY = platformFlag('O_EVTONLY')

/**
 * Close the descriptor on exec.
 *
 * Node opens every descriptor close-on-exec already and usually does not
 * publish the bit, in which case this is 0; it exists so flag sets can state
 * the intent.
 */
export const O_CLOEXEC = platformFlag('O_CLOEXEC')

/**
 * Check whether the platform defines an open flag.
 *
 * @param name - POSIX flag name, e.g. 'O_SYMLINK'
 * @returns true if the flag has a non-zero value here (O_RDONLY is always supported)
 */
export function isOpenFlagSupported(name: string): boolean {
  if (name === 'O_RDONLY') {
    return platformConstants.has(name)
  }
  return platformFlag(name) !== 0
}

/** Mask selecting the access mode bits of a flag set. */
export const O_ACCMODE = O_RDONLY | O_WRONLY | O_RDWR

// =============================================================================
// Permission Bits (open() mode argument)
// =============================================================================

/** Read permission, owner: 0o400 */
export const S_IRUSR = 0o400
/** Write permission, owner: 0o200 */
export const S_IWUSR = 0o200
/** Execute permission, owner: 0o100 */
export const S_IXUSR = 0o100
/** Read permission, group: 0o040 */
export const S_IRGRP = 0o040
/** Write permission, group: 0o020 */
export const S_IWGRP = 0o020
/** Execute permission, group: 0o010 */
export const S_IXGRP = 0o010
/** Read permission, others: 0o004 */
export const S_IROTH = 0o004
/** Write permission, others: 0o002 */
export const S_IWOTH = 0o002
/** Execute permission, others: 0o001 */
export const S_IXOTH = 0o001

/**
 * Set-user-ID on execution: 0o4000
 *
 * When executed, the process runs with the file owner's user ID.
 */
export const S_ISUID = 0o4000

/** Set-group-ID on execution: 0o2000 */
export const S_ISGID = 0o2000

/**
 * Sticky bit (saved swapped text): 0o1000
 *
 * On directories, only the owner may delete or rename entries.
 */
export const S_ISVTX = 0o1000

/** Owner read and write: 0o600 */
export const USER_READ_AND_WRITE = S_IRUSR | S_IWUSR
/** Group read and write: 0o060 */
export const GROUP_READ_AND_WRITE = S_IRGRP | S_IWGRP
/** Others read and write: 0o006 */
export const OTHER_READ_AND_WRITE = S_IROTH | S_IWOTH

/** Owner read, write and execute: 0o700 */
export const USER_ALL = S_IRUSR | S_IWUSR | S_IXUSR
/** Group read, write and execute: 0o070 */
export const GROUP_ALL = S_IRGRP | S_IWGRP | S_IXGRP
/** Others read, write and execute: 0o007 */
export const OTHER_ALL = S_IROTH | S_IWOTH | S_IXOTH

// =============================================================================
// Stream Constants
// =============================================================================

/**
 * Value returned by character reads at end of input.
 * Byte and wide reads share it: neither family ever yields a negative character.
 */
export const END_OF_FILE = -1
export const BYTE_END_OF_FILE = END_OF_FILE
export const WIDE_END_OF_FILE = END_OF_FILE

/** Accumulator length for byte string and line reads. */
export const BYTE_STRING_BUFFER_LENGTH = 4 * 1024

/** Accumulator length (in characters) for wide string and line reads. */
export const WIDE_STRING_BUFFER_LENGTH = 1024

/** Buffer capacity a stream starts with (BUFSIZ). */
export const DEFAULT_BUFFER_SIZE = 8 * 1024

/**
 * Floor for optimal buffering, and the size assumed when the OS reports no
 * block size: 64 KiB on Windows, 128 KiB elsewhere.
 */
export const RECOMMENDED_FILE_BLOCK_SIZE = process.platform === 'win32' ? 64 * 1024 : 2 * 64 * 1024

/** Largest byte count handed to a single transfer call (Linux read/write cap). */
export const MAX_TRANSFER_BYTES = 0x7ffff000

// =============================================================================
// Grouped Exports
// =============================================================================

/**
 * Open flag constants for use with RawFile.
 */
export const OpenFlags = {
  O_RDONLY,
  O_WRONLY,
  O_RDWR,
  O_NONBLOCK,
  O_APPEND,
  O_CREAT,
  O_TRUNC,
  O_EXCL,
  O_SHLOCK,
  O_EXLOCK,
  O_NOFOLLOW,
  O_SYMLINK,
  O_EVTONLY,
  O_CLOEXEC,
} as const
export type OpenFlags = typeof OpenFlags

/**
 * Permission bit constants for the RawFile mode argument.
 */
export const Permissions = {
  // Owner
  S_IRUSR,
  S_IWUSR,
  S_IXUSR,
  // Group
  S_IRGRP,
  S_IWGRP,
  S_IXGRP,
  // Other
  S_IROTH,
  S_IWOTH,
  S_IXOTH,
  // Special
  S_ISUID,
  S_ISGID,
  S_ISVTX,
  // Composite
  USER_READ_AND_WRITE,
  GROUP_READ_AND_WRITE,
  OTHER_READ_AND_WRITE,
  USER_ALL,
  GROUP_ALL,
  OTHER_ALL,
} as const
export type Permissions = typeof Permissions
