import { MatcherError } from '../../src/utils/MatcherError';

describe('MatcherError', () => {
  describe('constructor', () => {
    it('should create an error with message and kind', () => {
      const error = new MatcherError('Test error', 'configuration');

      expect(error.message).toBe('Test error');
      expect(error.kind).toBe('configuration');
      expect(error.name).toBe('MatcherError');
      expect(error).not.toHaveProperty('exitCode');
    });

    it('should be an instance of Error', () => {
      const error = new MatcherError('Test', 'session');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(MatcherError);
    });

    it('should capture stack trace', () => {
      const error = new MatcherError('Test', 'session');

      expect(error.stack).toBeDefined();
    });
  });

  describe('static methods', () => {
    it('should create invalid options error', () => {
      const error = MatcherError.invalidOptions('Bad flag');

      expect(error.kind).toBe('configuration');
      expect(error.message).toBe('Bad flag');
    });

    it('should name the payment account when it is missing', () => {
      const error = MatcherError.accountNotFound('payment', 'Assets:Checking');

      expect(error.kind).toBe('configuration');
      expect(error.message).toBe("Could not find payment account 'Assets:Checking'");
    });

    it('should name the control account when it is missing', () => {
      const error = MatcherError.accountNotFound('control', 'Assets:AR');

      expect(error.message).toBe("Could not find A/R or A/P account 'Assets:AR'");
    });

    it('should create session open error', () => {
      const error = MatcherError.sessionOpen('books.gnucash', 'file does not exist');

      expect(error.kind).toBe('session');
      expect(error.message).toBe("Error opening GnuCash file 'books.gnucash': file does not exist");
    });

    it('should create session locked error', () => {
      const error = MatcherError.sessionLocked('books.gnucash', 'desk (pid 7)');

      expect(error.kind).toBe('session');
      expect(error.message).toBe(
        "Error opening GnuCash file 'books.gnucash': locked by desk (pid 7); close it in GnuCash first"
      );
    });

    it('should create session save error', () => {
      const error = MatcherError.sessionSave('disk full');

      expect(error.kind).toBe('session');
      expect(error.message).toBe('Error saving GnuCash file: disk full');
    });

    it('should create session closed error', () => {
      expect(MatcherError.sessionClosed().message).toBe('Error saving GnuCash file: session has already ended');
    });
  });
});
