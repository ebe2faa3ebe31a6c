import { LiquidExpressionEvaluator } from '../../src/services/expression-evaluator';
import { LiquidTemplateRenderer, TemplateRenderError } from '../../src/services/template-renderer';

describe('LiquidTemplateRenderer', () => {
    const renderer = new LiquidTemplateRenderer();

    it('renders intent values and loops', async () => {
        const out = await renderer.render(
            'interface {{ intent.name }}\n{% for v in intent.vlans %} vlan {{ v }}\n{% endfor %}',
            { intent: { name: 'eth1', vlans: [10, 20] } },
        );
        expect(out).toBe('interface eth1\n vlan 10\n vlan 20\n');
    });

    it('returns text without delimiters as written', async () => {
        expect(await renderer.render('no templating here', {})).toBe('no templating here');
    });

    it('raises TemplateRenderError for unknown filters', async () => {
        await expect(renderer.render('{{ intent.name | shout }}', { intent: { name: 'x' } }))
            .rejects.toThrow(TemplateRenderError);
    });
});

describe('LiquidExpressionEvaluator', () => {
    const evaluator = new LiquidExpressionEvaluator();
    const context = { inputs: { vlan: 120, site: 'dc1' }, operation: 'apply', conditions: { ready: true } };

    it('evaluates comparisons and boolean operators', async () => {
        await expect(evaluator.evaluate('inputs.vlan > 100 and operation == "apply"', context)).resolves.toBe(true);
        await expect(evaluator.evaluate('inputs.site == "dc2" or conditions.ready == false', context)).resolves.toBe(false);
        await expect(evaluator.evaluate('conditions.ready', context)).resolves.toBe(true);
    });

    it('treats unknown paths as false', async () => {
        await expect(evaluator.evaluate('conditions.missing', context)).resolves.toBe(false);
    });

    it('rejects empty expressions and template delimiters', async () => {
        await expect(evaluator.evaluate('  ', context)).rejects.toThrow('Empty condition expression');
        await expect(evaluator.evaluate('true %}{% assign x = 1', context)).rejects.toThrow('without template delimiters');
    });

    it('cannot modify the context it reads', async () => {
        await evaluator.evaluate('inputs.vlan > 1', context);
        expect(context).toEqual({ inputs: { vlan: 120, site: 'dc1' }, operation: 'apply', conditions: { ready: true } });
    });
});
