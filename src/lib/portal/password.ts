const SALT_PATTERN = /^\s*-?\d+\s*$/;

export function isValidSalt(salt: string | null | undefined): salt is string {
  return !!salt && SALT_PATTERN.test(salt) && Number.isSafeInteger(Number.parseInt(salt, 10));
}

/**
 * XOR every character code of the password with the numeric salt the login
 * form publishes. Applying it twice with the same salt yields the input.
 *
 * A missing or non-numeric salt leaves the password as it is; the portal
 * accepts that form too.
 */
export function encodePassword(password: string, salt: string | null | undefined): string {
  if (!isValidSalt(salt)) {
    return password;
  }

  const key = Number.parseInt(salt, 10);
  let encoded = "";
  for (let i = 0; i < password.length; i++) {
    encoded += String.fromCharCode((key ^ password.charCodeAt(i)) & 0xffff);
  }
  return encoded;
}
