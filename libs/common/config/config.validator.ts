import * as dotenv from 'dotenv';
import { from } from 'env-var';

dotenv.config();

const env = from(process.env);

export default env;
