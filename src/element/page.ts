import { load } from 'cheerio';
import type { HttpMethod, HttpResponse, Inputs } from '../types.js';
import { BaseElement } from './base.js';

export class Link extends BaseElement {
  readonly type = 'link';

  constructor(url: string, inputs: Inputs = {}, action: string = url) {
    super(url, inputs, 'get', action);
  }

  dup(): Link {
    return this.copyStateTo(new Link(this.url));
  }
}

export class Form extends BaseElement {
  readonly type = 'form';

  constructor(url: string, inputs: Inputs = {}, method: HttpMethod = 'get', action: string = url) {
    super(url, inputs, method, action);
  }

  dup(): Form {
    return this.copyStateTo(new Form(this.url));
  }
}

export interface Page {
  url: string;
  links: Link[];
  forms: Form[];
}

/**
 * Collects the links (query parameters as inputs) and forms of an HTML
 * response. Links without a query string are kept; they simply have no inputs.
 */
export function pageFromResponse(response: HttpResponse): Page {
  const $ = load(response.body);
  const links: Link[] = [];
  const forms: Form[] = [];

  $('a[href]').each((_, el) => {
    const href = $(el).attr('href');
    if (href === undefined || !URL.canParse(href, response.url)) return;
    const target = new URL(href, response.url);
    if (target.protocol !== 'http:' && target.protocol !== 'https:') return;

    const inputs: Inputs = Object.fromEntries(target.searchParams);
    target.search = '';
    target.hash = '';
    links.push(new Link(response.url, inputs, target.toString()));
  });

  $('form').each((_, el) => {
    const form = $(el);
    const action = form.attr('action') ?? '';
    if (!URL.canParse(action, response.url)) return;
    const method: HttpMethod = form.attr('method')?.toLowerCase() === 'post' ? 'post' : 'get';

    const inputs: Inputs = {};
    form.find('input[name], select[name], textarea[name]').each((_, field) => {
      const input = $(field);
      const name = input.attr('name');
      if (!name) return;
      inputs[name] = input.is('textarea') ? input.text() : input.attr('value') ?? '';
    });

    forms.push(new Form(response.url, inputs, method, new URL(action, response.url).toString()));
  });

  return { url: response.url, links, forms };
}
