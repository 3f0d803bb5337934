/*
4.1 authentication: (http://bazaar.launchpad.net/~mysql/mysql-server/5.5/view/head:/sql/password.c)

  SERVER:  public_seed=create_random_string()
           send(public_seed)

  CLIENT:  recv(public_seed)
           hash_stage1=sha1("password")
           hash_stage2=sha1(hash_stage1)
           reply=xor(hash_stage1, sha1(public_seed,hash_stage2)

           // this three steps are done in scramblePassword()

           send(reply)


  SERVER:  recv(reply)
           hash_stage1=xor(reply, sha1(public_seed,hash_stage2))
           candidate_hash2=sha1(hash_stage1)
           check(candidate_hash2==hash_stage2)

server stores sha1(sha1(password)) ( hash_stag2)
*/

import { createHash } from 'node:crypto'

export const SCRAMBLE_LENGTH = 20

function sha1(...parts: Buffer[]) {
  const hash = createHash('sha1')
  for (const part of parts) {
    hash.update(part)
  }
  return hash.digest()
}

export function xor(a: Buffer, b: Buffer): Buffer {
  const result = Buffer.allocUnsafe(a.length)

  for (let i = 0; i < a.length; i++) {
    result[i] = a[i] ^ b[i]
  }
  return result
}

/**
 * Challenge-bound credential for `mysql_native_password`.
 * An empty password produces an empty token, which the server reads as "no password".
 */
export function scramblePassword(password: Buffer, challenge: Buffer): Buffer {
  if (password.length === 0) {
    return Buffer.alloc(0)
  }
  const stage1 = sha1(password)
  const stage2 = sha1(stage1)
  const stage3 = sha1(challenge.subarray(0, SCRAMBLE_LENGTH), stage2)
  return xor(stage1, stage3)
}

export function doubleSha1(password: Buffer) {
  return sha1(sha1(password))
}

export function verifyToken(challenge: Buffer, token: Buffer, doubleSha: Buffer) {
  if (token.length !== SCRAMBLE_LENGTH) {
    return false
  }
  const hashStage1 = xor(token, sha1(challenge.subarray(0, SCRAMBLE_LENGTH), doubleSha))
  const candidateHash2 = sha1(hashStage1)
  return candidateHash2.compare(doubleSha) === 0
}
