import Ajv from 'ajv';

/**
 * Shared validator instance. Schemas are compiled next to the types they
 * describe.
 */
const ajv = new Ajv();

export default ajv;
