import { AppError } from '../utils/app-error';

export class MissingParametersError extends AppError {
  constructor() {
    super('Missing parameters');
  }
}
