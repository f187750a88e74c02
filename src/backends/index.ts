import { BackendName, Settings } from '../config/settings.js';
import { ConfigurationError } from '../errors.js';
import { TranslationBackend } from '../types/index.js';
import { DeepLBackend } from './DeepLBackend.js';
import { EchoBackend } from './EchoBackend.js';
import { GoogleTranslateBackend } from './GoogleTranslateBackend.js';

export { DeepLBackend, EchoBackend, GoogleTranslateBackend };

export function createBackend(settings: Settings, name: BackendName = settings.backend): TranslationBackend {
  switch (name) {
    case 'deepl':
      if (!settings.deeplAuthKey) {
        throw new ConfigurationError('DEEPL_AUTH_KEY must be set to use the deepl backend');
      }
      return new DeepLBackend(settings.deeplAuthKey);
    case 'google':
      if (!settings.googleTranslateKey) {
        throw new ConfigurationError('GOOGLE_TRANSLATE_KEY must be set to use the google backend');
      }
      return new GoogleTranslateBackend(settings.googleTranslateKey);
    case 'echo':
      return new EchoBackend();
  }
}
