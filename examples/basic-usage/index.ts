/**
 * Affine97 Basic Usage Example
 *
 * Walks through key creation, encryption, decryption and the errors the
 * cipher raises.
 *
 * Run with: npm run example
 */

import {
  AffineKit,
  SequenceRandomSource,
  createKey,
  decrypt,
  encrypt,
  findUnsupportedCharacter,
  isAffineCipherError,
  makeKey,
} from '@affine97/sdk';

/**
 * Example 1: Fixed key
 */
function fixedKey() {
  console.log('\n=== Example 1: Fixed Key (m=5, b=8) ===\n');

  const key = createKey(5, 8);
  const ciphertext = encrypt(key, 'Attack at dawn!');

  console.log(`  Ciphertext: ${JSON.stringify(ciphertext)}`);
  console.log(`  Plaintext:  ${JSON.stringify(decrypt(key, ciphertext))}`);
}

/**
 * Example 2: Random key
 */
function randomKey() {
  console.log('\n=== Example 2: Random Key ===\n');

  const key = makeKey();
  console.log(`  Key: m=${key.m.value}, b=${key.b.value}`);
  console.log(`  Round trip: ${decrypt(key, encrypt(key, 'Hello\tworld\n')) === 'Hello\tworld\n'}`);
}

/**
 * Example 3: AffineKit with a reproducible key source
 */
function withKit() {
  console.log('\n=== Example 3: AffineKit ===\n');

  const kit = new AffineKit({ random: new SequenceRandomSource([42, 7]) });
  kit.on('key:generated', (key) => console.log(`  Generated key: m=${key.m.value}, b=${key.b.value}`));
  kit.on('encrypt:complete', (result) => console.log(`  Encrypted ${result.length} characters`));

  const ciphertext = kit.encrypt('{"id": 1}');
  console.log(`  Ciphertext: ${JSON.stringify(ciphertext)}`);
  console.log(`  Plaintext:  ${JSON.stringify(kit.decrypt(ciphertext))}`);
}

/**
 * Example 4: Validating input first
 */
function unsupportedInput() {
  console.log('\n=== Example 4: Unsupported Characters ===\n');

  const text = 'Price: 5€';
  const offender = findUnsupportedCharacter(text);
  if (offender) {
    console.log(`  ${JSON.stringify(offender.character)} at position ${offender.index} is not in the alphabet`);
  }

  try {
    encrypt(createKey(5, 8), text);
  } catch (error) {
    if (isAffineCipherError(error)) {
      console.log(`  ${error.code}: ${error.message}`);
    } else {
      throw error;
    }
  }
}

function main() {
  try {
    fixedKey();
    randomKey();
    withKit();
    unsupportedInput();
    console.log('\nAll examples complete.\n');
  } catch (error) {
    console.error('Error running examples:', error);
    process.exit(1);
  }
}

main();
