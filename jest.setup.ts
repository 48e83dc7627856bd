// Keep Jest output readable.
jest.spyOn(global.console, 'warn').mockImplementation(() => undefined);
