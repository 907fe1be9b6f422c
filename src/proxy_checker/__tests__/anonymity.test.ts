import { classifyAnonymity, findHeader, findInjectedHeaders } from '~/proxy_checker/anonymity';

const REAL_IP = '198.51.100.7';

describe('classifyAnonymity', () => {
    it('should classify a proxy without forwarding headers as elite', () => {
        expect(classifyAnonymity({ Host: 'echo.test', Accept: '*/*' }, REAL_IP)).toBe('Elite');
    });

    it('should classify a proxy forwarding our ip as transparent', () => {
        expect(classifyAnonymity({ 'X-Forwarded-For': REAL_IP }, REAL_IP)).toBe('Transparent');
    });

    it('should find our ip anywhere in the chain, whatever the header case', () => {
        expect(classifyAnonymity({ 'x-forwarded-for': `10.0.0.1, ${ REAL_IP }` }, REAL_IP)).toBe('Transparent');
    });

    it('should not mistake a longer address for ours', () => {
        expect(classifyAnonymity({ 'X-Forwarded-For': '198.51.100.77' }, REAL_IP)).toBe('Anonymous');
    });

    it('should classify a proxy announcing itself with Via as anonymous', () => {
        expect(classifyAnonymity({ Via: '1.1 squid' }, REAL_IP)).toBe('Anonymous');
    });

    it('should classify forwarding headers as anonymous when our ip is unknown', () => {
        expect(classifyAnonymity({ 'X-Forwarded-For': REAL_IP })).toBe('Anonymous');
    });
});

describe('findHeader', () => {
    it('should look headers up case-insensitively', () => {
        expect(findHeader({ 'X-Forwarded-For': '10.0.0.1' }, 'x-forwarded-for')).toBe('10.0.0.1');
        expect(findHeader({ Host: 'echo.test' }, 'Via')).toBeUndefined();
    });
});

describe('findInjectedHeaders', () => {
    it('should list the headers neither we nor the echo service sent', () => {
        expect(findInjectedHeaders({
            'Host': 'echo.test',
            'Accept': 'application/json',
            'User-Agent': 'axios/1.7.7',
            'Via': '1.1 squid',
            'X-Amzn-Trace-Id': 'Root=1-0',
            'X-Forwarded-For': REAL_IP,
        })).toBe('Via, X-Forwarded-For');
    });

    it('should return undefined when nothing was injected', () => {
        expect(findInjectedHeaders({ 'host': 'echo.test', 'accept-encoding': 'gzip' })).toBeUndefined();
    });
});
