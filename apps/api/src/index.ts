import 'dotenv/config';
import { App } from './app';

new App().listen();
