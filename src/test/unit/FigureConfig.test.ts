import { DEFAULT_FIGURE_CONFIG, resolveFigureConfig } from '../../figure/config';
import { FigureConfigError } from '../../figure/errors';
import { logger } from '../../utils/logger';

describe('figure config', () => {
    afterEach(() => {
        logger.setDebugMode(false);
        jest.restoreAllMocks();
    });

    it('defaults both options to false', () => {
        expect(resolveFigureConfig()).toEqual({ imageLink: false, skipNoCaption: false });
        expect(resolveFigureConfig(null)).toBe(DEFAULT_FIGURE_CONFIG);
        expect(resolveFigureConfig({})).toEqual(DEFAULT_FIGURE_CONFIG);
    });

    it('reads the recognized options into a frozen config', () => {
        const config = resolveFigureConfig({ imageLink: true, skipNoCaption: true });

        expect(config).toEqual({ imageLink: true, skipNoCaption: true });
        expect(Object.isFrozen(config)).toBe(true);
    });

    it('ignores unrecognized keys and reports them in debug mode', () => {
        const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        logger.setDebugMode(true);

        const config = resolveFigureConfig({ skipNoCaption: true, image_link: true });

        expect(config).toEqual({ imageLink: false, skipNoCaption: true });
        expect(log).toHaveBeenCalledWith('[figure]', 'ignoring unrecognized options: image_link');
    });

    it('stays quiet about unknown keys outside debug mode', () => {
        const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

        resolveFigureConfig({ extra: 1 });

        expect(log).not.toHaveBeenCalled();
    });

    it('rejects non-boolean option values', () => {
        expect(() => resolveFigureConfig({ imageLink: 'yes' })).toThrow(FigureConfigError);
        expect(() => resolveFigureConfig({ skipNoCaption: 1 })).toThrow('Figure option "skipNoCaption" must be a boolean');
    });

    it('rejects options that are not an object', () => {
        expect(() => resolveFigureConfig('imageLink')).toThrow(FigureConfigError);
        expect(() => resolveFigureConfig([true])).toThrow('Figure options must be an object');
    });

    it('carries context on config errors', () => {
        try {
            resolveFigureConfig({ imageLink: 0 });
            throw new Error('expected resolveFigureConfig to throw');
        } catch (error) {
            expect(error).toBeInstanceOf(FigureConfigError);
            expect(error).toMatchObject({
                name: 'FigureConfigError',
                context: { key: 'imageLink', received: 'number' }
            });
        }
    });
});
